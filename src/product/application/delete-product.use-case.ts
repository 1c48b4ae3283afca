import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';

@Injectable()
export class DeleteProductUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  async execute(productId: number): Promise<void> {
    await this.productService.deleteProduct(productId);
  }
}
