import { Module } from '@nestjs/common';
import { ProductModule } from '../product/product.module';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { OrderMemoryRepository } from '@/order/infrastructure/order.memory.repository';
import { OrderController } from '@/order/presentation/order.controller';
import { OrderLifecycleManager } from '@/order/application/order-lifecycle.manager';

// Use Cases
import { CreateOrderUseCase } from '@/order/application/create-order.use-case';
import { GetOrderDetailUseCase } from '@/order/application/get-order-detail.use-case';
import { CancelOrderUseCase } from '@/order/application/cancel-order.use-case';
import { PartialReturnUseCase } from '@/order/application/partial-return.use-case';

/**
 * Order Module
 * 주문 생명주기 및 재고 예약 모듈
 */
@Module({
  imports: [ProductModule],
  controllers: [OrderController],
  providers: [
    // Order Repository (자신의 도메인만)
    OrderMemoryRepository,
    {
      provide: IOrderRepository,
      useExisting: OrderMemoryRepository,
    },

    OrderLifecycleManager,

    // Use Cases
    CreateOrderUseCase,
    GetOrderDetailUseCase,
    CancelOrderUseCase,
    PartialReturnUseCase,
  ],
  exports: [OrderLifecycleManager, IOrderRepository],
})
export class OrderModule {}
