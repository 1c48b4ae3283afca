import { Injectable } from '@nestjs/common';
import { OrderLifecycleManager } from './order-lifecycle.manager';
import { CreateOrderCommand, OrderResult } from './dto/order.dto';

@Injectable()
export class CreateOrderUseCase {
  constructor(private readonly orderLifecycle: OrderLifecycleManager) {}

  /**
   * ANCHOR 주문 생성
   * 재고 차감 + 주문 생성을 하나의 작업 단위로 처리
   */
  async execute(cmd: CreateOrderCommand): Promise<OrderResult> {
    const order = await this.orderLifecycle.createOrder(
      cmd.customerName,
      cmd.items,
    );

    return OrderResult.fromDomain(order);
  }
}
