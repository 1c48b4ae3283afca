import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { ProductResult } from './dto/product.dto';

@Injectable()
export class GetProductDetailUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  /**
   * ANCHOR 상품 상세 조회
   */
  async execute(productId: number): Promise<ProductResult> {
    const product = await this.productService.getProduct(productId);

    return ProductResult.fromDomain(product);
  }
}
