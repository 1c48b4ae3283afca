import { Order } from '@/order/domain/entities/order.entity';
import { TransactionHandle } from '@common/transaction-manager/transaction.types';

/**
 * Order Repository Port
 * 주문 데이터 접근 계약
 */
export abstract class IOrderRepository {
  abstract findById(id: number, tx?: TransactionHandle): Promise<Order | null>;
  abstract create(order: Order, tx?: TransactionHandle): Promise<Order>;

  /**
   * 저장할 때마다 updatedAt을 현재 시각으로 갱신한다.
   */
  abstract update(order: Order, tx?: TransactionHandle): Promise<Order>;
}
