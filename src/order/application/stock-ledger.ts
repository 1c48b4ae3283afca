import { IProductRepository } from '@/product/domain/interfaces/product.repository.interface';
import { Product } from '@/product/domain/entities/product.entity';
import { TransactionHandle } from '@common/transaction-manager/transaction.types';
import { ErrorCode, DomainException } from '@common/exception';

/**
 * StockLedger
 * 하나의 작업 단위 안에서 재고 변경을 스테이징한다.
 * reserve/release는 복사본만 바꾸고, commit이 호출되어야 저장소에 반영된다.
 * 검증이 모두 끝난 뒤에만 commit하므로 실패한 작업은 아무것도 남기지 않는다.
 */
export class StockLedger {
  private readonly staged = new Map<number, Product>();

  constructor(
    private readonly productRepository: IProductRepository,
    private readonly tx: TransactionHandle,
  ) {}

  /**
   * ANCHOR 재고 차감 스테이징
   * 같은 상품을 여러 번 차감하면 누적된 값 기준으로 검사한다.
   */
  async reserve(productId: number, quantity: number): Promise<void> {
    const product = await this.load(productId);
    product.decreaseStock(quantity);
  }

  /**
   * ANCHOR 재고 복원 스테이징
   */
  async release(productId: number, quantity: number): Promise<void> {
    const product = await this.load(productId);
    product.increaseStock(quantity);
  }

  /**
   * ANCHOR 스테이징된 재고 반영
   */
  async commit(): Promise<Product[]> {
    const committed: Product[] = [];
    for (const product of this.staged.values()) {
      committed.push(await this.productRepository.update(product, this.tx));
    }
    this.staged.clear();
    return committed;
  }

  private async load(productId: number): Promise<Product> {
    const staged = this.staged.get(productId);
    if (staged) {
      return staged;
    }

    const product = await this.productRepository.findById(productId, this.tx);
    if (!product) {
      throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
    }
    this.staged.set(productId, product);
    return product;
  }
}
