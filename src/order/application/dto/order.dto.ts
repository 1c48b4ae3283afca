import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { OrderItemData } from '@/order/domain/entities/order.types';

/**
 * 애플리케이션 레이어 DTO: CreateOrder 요청
 */
export class CreateOrderCommand {
  constructor(
    public readonly customerName: string,
    public readonly items: OrderItemData[],
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: PartialReturn 요청
 */
export class PartialReturnCommand {
  constructor(
    public readonly orderId: number,
    public readonly items: OrderItemData[],
  ) {}
}

/**
 * 주문 항목 결과
 */
export class OrderItemResult {
  constructor(
    public readonly productId: number,
    public readonly quantity: number,
  ) {}

  static fromDomain(item: OrderItem): OrderItemResult {
    return new OrderItemResult(item.productId, item.quantity);
  }
}

/**
 * 애플리케이션 레이어 DTO: 주문 응답
 */
export class OrderResult {
  constructor(
    public readonly id: number,
    public readonly customerName: string,
    public readonly items: OrderItemResult[],
    public readonly status: string,
    public readonly createdAt: Date,
    public readonly updatedAt: Date,
  ) {}

  static fromDomain(order: Order): OrderResult {
    return new OrderResult(
      order.id,
      order.customerName,
      order.items.map((item) => OrderItemResult.fromDomain(item)),
      order.status.value,
      order.createdAt,
      order.updatedAt,
    );
  }
}
