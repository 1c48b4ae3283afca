import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { CreateProductCommand, ProductResult } from './dto/product.dto';

@Injectable()
export class CreateProductUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  /**
   * ANCHOR 상품 등록
   */
  async execute(cmd: CreateProductCommand): Promise<ProductResult> {
    const product = await this.productService.createProduct({
      name: cmd.name,
      sku: cmd.sku,
      price: cmd.price,
      stock: cmd.stock,
    });

    return ProductResult.fromDomain(product);
  }
}
