import { Injectable } from '@nestjs/common';
import {
  IProductRepository,
  ProductFilter,
} from '@/product/domain/interfaces/product.repository.interface';
import { TransactionManager } from '@common/transaction-manager/transaction.manager';
import {
  ErrorCode,
  DomainException,
  ValidationException,
} from '@common/exception';
import { Product } from '../entities/product.entity';

/**
 * 상품 생성/수정 입력 데이터
 */
export interface ProductData {
  name: string;
  sku: string;
  price: number;
  stock: number;
}

export type ProductUpdateData = Omit<ProductData, 'sku'>;

/**
 * ProductDomainService
 * 상품 카탈로그 관리. 필드 검증 외의 불변식은 없다.
 */
@Injectable()
export class ProductDomainService {
  constructor(
    private readonly productRepository: IProductRepository,
    private readonly transactionManager: TransactionManager,
  ) {}

  /**
   * ANCHOR 상품 등록
   */
  async createProduct(data: ProductData): Promise<Product> {
    const product = new Product(
      0,
      data.name,
      data.sku,
      data.price,
      data.stock,
    );
    return await this.productRepository.create(product);
  }

  /**
   * ANCHOR 상품 단건 조회
   */
  async getProduct(productId: number): Promise<Product> {
    this.validateProductId(productId);

    const product = await this.productRepository.findById(productId);
    if (!product) {
      throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
    }
    return product;
  }

  /**
   * ANCHOR 상품 수정
   * 조회와 저장 사이에 다른 쓰기가 끼어들지 않도록 하나의 작업 단위로 실행한다.
   */
  async updateProduct(
    productId: number,
    data: ProductUpdateData,
  ): Promise<Product> {
    this.validateProductId(productId);

    return this.transactionManager.runExclusive(async (tx) => {
      const product = await this.productRepository.findById(productId, tx);
      if (!product) {
        throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
      }

      product.changeDetails(data.name, data.price, data.stock);
      return await this.productRepository.update(product, tx);
    });
  }

  /**
   * ANCHOR 상품 삭제
   */
  async deleteProduct(productId: number): Promise<void> {
    this.validateProductId(productId);

    await this.transactionManager.runExclusive(async (tx) => {
      const product = await this.productRepository.findById(productId, tx);
      if (!product) {
        throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
      }
      await this.productRepository.delete(productId, tx);
    });
  }

  /**
   * ANCHOR 상품 목록 조회 (이름 부분 일치, 가격 범위)
   */
  async getProducts(filter: ProductFilter): Promise<Product[]> {
    const { minPrice, maxPrice } = filter;
    if (
      (minPrice !== undefined && minPrice < 0) ||
      (maxPrice !== undefined && maxPrice < 0)
    ) {
      throw new ValidationException(ErrorCode.INVALID_PRICE);
    }
    if (minPrice !== undefined && maxPrice !== undefined && minPrice > maxPrice) {
      throw new ValidationException(ErrorCode.INVALID_PRICE_RANGE);
    }

    return await this.productRepository.findMany(filter);
  }

  private validateProductId(productId: number): void {
    if (!Number.isInteger(productId) || productId <= 0) {
      throw new ValidationException(ErrorCode.INVALID_PRODUCT_ID);
    }
  }
}
