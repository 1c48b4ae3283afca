import { Product } from '@/product/domain/entities/product.entity';
import { ProductFilter } from '@/product/domain/interfaces/product.repository.interface';

/**
 * 애플리케이션 레이어 DTO: CreateProduct 요청
 */
export class CreateProductCommand {
  constructor(
    public readonly name: string,
    public readonly sku: string,
    public readonly price: number,
    public readonly stock: number,
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: UpdateProduct 요청
 */
export class UpdateProductCommand {
  constructor(
    public readonly productId: number,
    public readonly name: string,
    public readonly price: number,
    public readonly stock: number,
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: GetProducts 요청
 */
export class GetProductsQuery implements ProductFilter {
  constructor(
    public readonly nameSubstring?: string,
    public readonly minPrice?: number,
    public readonly maxPrice?: number,
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: 상품 응답
 */
export class ProductResult {
  constructor(
    public readonly id: number,
    public readonly name: string,
    public readonly sku: string,
    public readonly price: number,
    public readonly stock: number,
  ) {}

  static fromDomain(product: Product): ProductResult {
    return new ProductResult(
      product.id,
      product.name,
      product.sku,
      product.price,
      product.stock,
    );
  }
}
