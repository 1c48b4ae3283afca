import { ErrorCode, ValidationException } from '@common/exception';
import { OrderItemData } from './order.types';

/**
 * OrderItem
 * 주문 항목(라인). 같은 주문 안에 동일 상품을 가리키는 항목이 여러 개 있을 수 있다.
 */
export class OrderItem implements OrderItemData {
  constructor(
    public readonly productId: number,
    public readonly quantity: number,
  ) {
    this.validateProductId();
    this.validateQuantity();
  }

  static from(data: OrderItemData): OrderItem {
    return new OrderItem(data.productId, data.quantity);
  }

  /**
   * ANCHOR 상품별 수량 합산
   * 결과 Map의 순서는 각 상품이 처음 등장한 순서를 따른다.
   */
  static sumByProduct(items: ReadonlyArray<OrderItemData>): Map<number, number> {
    const totals = new Map<number, number>();
    for (const item of items) {
      totals.set(item.productId, (totals.get(item.productId) ?? 0) + item.quantity);
    }
    return totals;
  }

  private validateProductId(): void {
    if (!Number.isInteger(this.productId) || this.productId <= 0) {
      throw new ValidationException(ErrorCode.INVALID_PRODUCT_ID);
    }
  }

  private validateQuantity(): void {
    if (!Number.isInteger(this.quantity) || this.quantity <= 0) {
      throw new ValidationException(ErrorCode.INVALID_QUANTITY);
    }
  }

  withQuantity(quantity: number): OrderItem {
    return new OrderItem(this.productId, quantity);
  }
}
