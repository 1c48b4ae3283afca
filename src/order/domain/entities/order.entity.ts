import {
  ErrorCode,
  DomainException,
  ValidationException,
} from '@common/exception';
import { OrderItem } from './order-item.entity';
import { OrderStatus } from './order-status.vo';
import { OrderItemData } from './order.types';

/**
 * Order Entity
 * 주문 정보
 */
export class Order {
  constructor(
    public readonly id: number,
    public readonly customerName: string,
    public items: OrderItem[],
    public status: OrderStatus,
    public readonly createdAt: Date,
    public updatedAt: Date,
  ) {
    this.validateCustomerName();
  }

  /**
   * ANCHOR 확정 주문 생성
   * 저장 전이므로 id는 0이며, 항목은 입력 그대로(중복 상품 포함) 보존한다.
   */
  static confirmed(
    customerName: string,
    items: OrderItem[],
    createdAt: Date,
  ): Order {
    return new Order(
      0,
      customerName,
      [...items],
      OrderStatus.CONFIRMED,
      createdAt,
      createdAt,
    );
  }

  private validateCustomerName(): void {
    if (this.customerName.trim().length === 0) {
      throw new ValidationException(ErrorCode.INVALID_CUSTOMER_NAME);
    }
  }

  /**
   * ANCHOR 상품별 보유 수량
   */
  heldQuantities(): Map<number, number> {
    return OrderItem.sumByProduct(this.items);
  }

  /**
   * ANCHOR 확정 상태 검증
   */
  ensureConfirmed(): void {
    if (!this.status.isConfirmed()) {
      throw new DomainException(ErrorCode.INVALID_ORDER_STATUS);
    }
  }

  /**
   * ANCHOR 주문 취소
   * CONFIRMED 주문만 취소할 수 있다. 복원할 재고는 항목 그대로 반환한다.
   */
  cancel(): OrderItemData[] {
    this.ensureConfirmed();
    this.status = OrderStatus.CANCELLED;

    return this.items.map((item) => ({
      productId: item.productId,
      quantity: item.quantity,
    }));
  }

  /**
   * ANCHOR 부분 반품
   *
   * 항목을 저장된 순서대로 훑으며 상품별로 이미 소진한 반품 수량(consumed)을 누적한다.
   * 한 항목이 요청량을 다 흡수하지 못하면 남은 양은 같은 상품의 다음 항목으로 이월된다.
   * 수량이 0이 된 항목은 제거되고 남은 항목의 순서는 유지된다.
   * 반품 후 항목이 모두 사라져도 상태는 CONFIRMED로 유지된다.
   *
   * @returns 영향을 받은 항목 순서대로의 재고 복원 내역
   */
  applyReturn(returnItems: ReadonlyArray<OrderItemData>): OrderItemData[] {
    this.ensureConfirmed();

    const returnTotals = OrderItem.sumByProduct(returnItems);
    const held = this.heldQuantities();
    for (const [productId, quantity] of returnTotals) {
      if ((held.get(productId) ?? 0) < quantity) {
        throw new ValidationException(ErrorCode.RETURN_QUANTITY_EXCEEDED);
      }
    }

    const consumed = new Map<number, number>();
    const remaining: OrderItem[] = [];
    const restorations: OrderItemData[] = [];

    for (const item of this.items) {
      const totalReturn = returnTotals.get(item.productId) ?? 0;
      const alreadyConsumed = consumed.get(item.productId) ?? 0;

      if (alreadyConsumed >= totalReturn) {
        remaining.push(item);
        continue;
      }

      const need = totalReturn - alreadyConsumed;
      const available = item.quantity;

      if (need < available) {
        remaining.push(item.withQuantity(available - need));
        consumed.set(item.productId, alreadyConsumed + need);
        restorations.push({ productId: item.productId, quantity: need });
      } else {
        // need >= available: 항목 전체를 반품하고 부족분은 다음 항목으로 넘긴다
        consumed.set(item.productId, alreadyConsumed + available);
        restorations.push({ productId: item.productId, quantity: available });
      }
    }

    this.items = remaining;
    return restorations;
  }

  clone(): Order {
    return new Order(
      this.id,
      this.customerName,
      [...this.items],
      this.status,
      new Date(this.createdAt.getTime()),
      new Date(this.updatedAt.getTime()),
    );
  }
}
