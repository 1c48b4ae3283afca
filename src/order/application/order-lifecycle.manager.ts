import { Injectable, Logger } from '@nestjs/common';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { IProductRepository } from '@/product/domain/interfaces/product.repository.interface';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { OrderItemData } from '@/order/domain/entities/order.types';
import { TransactionManager } from '@common/transaction-manager/transaction.manager';
import {
  ErrorCode,
  DomainException,
  ValidationException,
} from '@common/exception';
import { StockLedger } from './stock-ledger';

/**
 * OrderLifecycleManager
 *
 * 주문 생성/조회/취소/부분 반품과 그에 따른 재고 예약/복원을 담당한다.
 * 변경이 있는 연산은 모두 TransactionManager의 배타 작업 단위 하나로 실행된다.
 *
 * 코디네이터는 롤백을 하지 않으므로 각 연산은 StockLedger로 변경을 스테이징하고
 * 모든 검증이 통과한 뒤에 상품 재고, 주문 순으로 반영한다.
 */
@Injectable()
export class OrderLifecycleManager {
  private readonly logger = new Logger(OrderLifecycleManager.name);

  constructor(
    private readonly orderRepository: IOrderRepository,
    private readonly productRepository: IProductRepository,
    private readonly transactionManager: TransactionManager,
  ) {}

  /**
   * ANCHOR 주문 생성
   * 상품별 요청 수량을 합산한 뒤 재고를 검사하고 차감한다.
   * 저장되는 주문 항목은 합산 전 입력 그대로다.
   */
  async createOrder(
    customerName: string,
    items: ReadonlyArray<OrderItemData>,
  ): Promise<Order> {
    if (customerName.trim().length === 0) {
      throw new ValidationException(ErrorCode.INVALID_CUSTOMER_NAME);
    }
    const orderItems = this.toOrderItems(items);

    try {
      const created = await this.transactionManager.runExclusive(async (tx) => {
        const ledger = new StockLedger(this.productRepository, tx);

        for (const [productId, quantity] of OrderItem.sumByProduct(orderItems)) {
          await ledger.reserve(productId, quantity);
        }

        await ledger.commit();
        return await this.orderRepository.create(
          Order.confirmed(customerName, orderItems, tx.startedAt),
          tx,
        );
      });

      this.logger.log(
        `주문 생성 완료 orderId=${created.id} items=${created.items.length}`,
      );
      return created;
    } catch (error) {
      this.logRejection('createOrder', error);
      throw error;
    }
  }

  /**
   * ANCHOR 주문 조회
   * 트랜잭션 없이 공유 모드로 읽는다.
   */
  async getOrder(orderId: number): Promise<Order> {
    this.validateOrderId(orderId);

    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new DomainException(ErrorCode.ORDER_NOT_FOUND);
    }
    return order;
  }

  /**
   * ANCHOR 주문 취소
   * CONFIRMED 주문의 모든 항목 수량을 재고로 되돌리고 CANCELLED로 전환한다.
   */
  async cancelOrder(orderId: number): Promise<Order> {
    this.validateOrderId(orderId);

    try {
      const cancelled = await this.transactionManager.runExclusive(async (tx) => {
        const order = await this.orderRepository.findById(orderId, tx);
        if (!order) {
          throw new DomainException(ErrorCode.ORDER_NOT_FOUND);
        }

        const ledger = new StockLedger(this.productRepository, tx);
        for (const item of order.cancel()) {
          await ledger.release(item.productId, item.quantity);
        }

        await ledger.commit();
        return await this.orderRepository.update(order, tx);
      });

      this.logger.log(`주문 취소 완료 orderId=${cancelled.id}`);
      return cancelled;
    } catch (error) {
      this.logRejection('cancelOrder', error);
      throw error;
    }
  }

  /**
   * ANCHOR 부분 반품
   * 반품 수량만큼 주문 항목을 줄이고 재고를 복원한다. 주문은 CONFIRMED로 유지된다.
   */
  async partialReturn(
    orderId: number,
    returnItems: ReadonlyArray<OrderItemData>,
  ): Promise<Order> {
    this.validateOrderId(orderId);
    const returns = this.toOrderItems(returnItems);

    try {
      const returned = await this.transactionManager.runExclusive(async (tx) => {
        const order = await this.orderRepository.findById(orderId, tx);
        if (!order) {
          throw new DomainException(ErrorCode.ORDER_NOT_FOUND);
        }

        const ledger = new StockLedger(this.productRepository, tx);
        for (const restoration of order.applyReturn(returns)) {
          await ledger.release(restoration.productId, restoration.quantity);
        }

        await ledger.commit();
        return await this.orderRepository.update(order, tx);
      });

      this.logger.log(
        `부분 반품 완료 orderId=${returned.id} remainingItems=${returned.items.length}`,
      );
      return returned;
    } catch (error) {
      this.logRejection('partialReturn', error);
      throw error;
    }
  }

  private toOrderItems(items: ReadonlyArray<OrderItemData>): OrderItem[] {
    if (items.length === 0) {
      throw new ValidationException(ErrorCode.EMPTY_ORDER_ITEMS);
    }
    return items.map((item) => OrderItem.from(item));
  }

  private validateOrderId(orderId: number): void {
    if (!Number.isInteger(orderId) || orderId <= 0) {
      throw new ValidationException(ErrorCode.INVALID_ORDER_ID);
    }
  }

  private logRejection(operation: string, error: unknown): void {
    const reason = error instanceof Error ? error.message : String(error);
    this.logger.warn(`${operation} 실패: ${reason}`);
  }
}
