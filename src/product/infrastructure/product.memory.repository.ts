import { Injectable } from '@nestjs/common';
import { TransactionManager } from '@common/transaction-manager/transaction.manager';
import { TransactionHandle } from '@common/transaction-manager/transaction.types';
import { ErrorCode, RepositoryException } from '@common/exception';
import { Product } from '../domain/entities/product.entity';
import {
  IProductRepository,
  ProductFilter,
} from '../domain/interfaces/product.repository.interface';

/**
 * Product Repository Implementation (In-Memory)
 * 동시성 제어: TransactionManager의 읽기/쓰기 락을 통한 직렬화 보장
 * 조회 결과는 복사본이므로 update 전까지 저장된 상태에 영향을 주지 않는다.
 */
@Injectable()
export class ProductMemoryRepository implements IProductRepository {
  private products: Map<number, Product> = new Map();
  private currentId = 1;

  constructor(private readonly transactionManager: TransactionManager) {}

  // ANCHOR product.findById
  async findById(id: number, tx?: TransactionHandle): Promise<Product | null> {
    return this.transactionManager.read(
      tx,
      () => this.products.get(id)?.clone() ?? null,
    );
  }

  // ANCHOR product.findMany
  async findMany(
    filter: ProductFilter,
    tx?: TransactionHandle,
  ): Promise<Product[]> {
    const needle = (filter.nameSubstring ?? '').toLowerCase();

    return this.transactionManager.read(tx, () =>
      Array.from(this.products.values())
        .filter((product) => product.name.toLowerCase().includes(needle))
        .filter(
          (product) =>
            filter.minPrice === undefined || product.price >= filter.minPrice,
        )
        .filter(
          (product) =>
            filter.maxPrice === undefined || product.price <= filter.maxPrice,
        )
        .sort((a, b) => a.id - b.id)
        .map((product) => product.clone()),
    );
  }

  // ANCHOR product.create
  async create(product: Product, tx?: TransactionHandle): Promise<Product> {
    return this.transactionManager.write(tx, () => {
      const newProduct = new Product(
        this.currentId++,
        product.name,
        product.sku,
        product.price,
        product.stock,
      );
      this.products.set(newProduct.id, newProduct);
      return newProduct.clone();
    });
  }

  // ANCHOR product.update
  async update(product: Product, tx?: TransactionHandle): Promise<Product> {
    return this.transactionManager.write(tx, () => {
      if (!this.products.has(product.id)) {
        throw new RepositoryException(ErrorCode.PRODUCT_NOT_FOUND);
      }
      this.products.set(product.id, product.clone());
      return product.clone();
    });
  }

  // ANCHOR product.delete
  async delete(id: number, tx?: TransactionHandle): Promise<void> {
    return this.transactionManager.write(tx, () => {
      if (!this.products.delete(id)) {
        throw new RepositoryException(ErrorCode.PRODUCT_NOT_FOUND);
      }
    });
  }
}
