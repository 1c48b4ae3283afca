import { Product } from '@/product/domain/entities/product.entity';
import { TransactionHandle } from '@common/transaction-manager/transaction.types';

/**
 * 상품 목록 필터
 * 상품명 부분 일치(대소문자 무시), 가격 범위(양 끝 포함)
 */
export interface ProductFilter {
  nameSubstring?: string;
  minPrice?: number;
  maxPrice?: number;
}

/**
 * Product Repository Port
 * 상품 데이터 접근 계약.
 * 모든 메서드는 트랜잭션 핸들을 선택적으로 받는다. 핸들이 있으면 락을 다시 잡지 않는다.
 */
export abstract class IProductRepository {
  abstract findById(id: number, tx?: TransactionHandle): Promise<Product | null>;
  abstract findMany(
    filter: ProductFilter,
    tx?: TransactionHandle,
  ): Promise<Product[]>;
  abstract create(product: Product, tx?: TransactionHandle): Promise<Product>;
  abstract update(product: Product, tx?: TransactionHandle): Promise<Product>;
  abstract delete(id: number, tx?: TransactionHandle): Promise<void>;
}
