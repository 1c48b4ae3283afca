import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { GetProductsQuery, ProductResult } from './dto/product.dto';

@Injectable()
export class GetProductsUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  /**
   * ANCHOR 상품 목록 조회
   */
  async execute(query: GetProductsQuery): Promise<ProductResult[]> {
    const products = await this.productService.getProducts(query);

    return products.map((product) => ProductResult.fromDomain(product));
  }
}
