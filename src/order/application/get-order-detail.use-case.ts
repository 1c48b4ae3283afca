import { Injectable } from '@nestjs/common';
import { OrderLifecycleManager } from './order-lifecycle.manager';
import { OrderResult } from './dto/order.dto';

@Injectable()
export class GetOrderDetailUseCase {
  constructor(private readonly orderLifecycle: OrderLifecycleManager) {}

  /**
   * ANCHOR 주문 상세 조회
   */
  async execute(orderId: number): Promise<OrderResult> {
    const order = await this.orderLifecycle.getOrder(orderId);

    return OrderResult.fromDomain(order);
  }
}
