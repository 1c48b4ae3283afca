import { Injectable } from '@nestjs/common';
import { OrderLifecycleManager } from './order-lifecycle.manager';
import { OrderResult } from './dto/order.dto';

@Injectable()
export class CancelOrderUseCase {
  constructor(private readonly orderLifecycle: OrderLifecycleManager) {}

  /**
   * ANCHOR 주문 취소
   */
  async execute(orderId: number): Promise<OrderResult> {
    const order = await this.orderLifecycle.cancelOrder(orderId);

    return OrderResult.fromDomain(order);
  }
}
