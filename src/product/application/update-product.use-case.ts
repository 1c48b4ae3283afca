import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { ProductResult, UpdateProductCommand } from './dto/product.dto';

@Injectable()
export class UpdateProductUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  /**
   * ANCHOR 상품 수정
   */
  async execute(cmd: UpdateProductCommand): Promise<ProductResult> {
    const product = await this.productService.updateProduct(cmd.productId, {
      name: cmd.name,
      price: cmd.price,
      stock: cmd.stock,
    });

    return ProductResult.fromDomain(product);
  }
}
