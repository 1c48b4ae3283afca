import { Injectable } from '@nestjs/common';
import { OrderLifecycleManager } from './order-lifecycle.manager';
import { OrderResult, PartialReturnCommand } from './dto/order.dto';

@Injectable()
export class PartialReturnUseCase {
  constructor(private readonly orderLifecycle: OrderLifecycleManager) {}

  /**
   * ANCHOR 부분 반품
   */
  async execute(cmd: PartialReturnCommand): Promise<OrderResult> {
    const order = await this.orderLifecycle.partialReturn(
      cmd.orderId,
      cmd.items,
    );

    return OrderResult.fromDomain(order);
  }
}
