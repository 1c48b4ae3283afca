import { Injectable } from '@nestjs/common';
import { TransactionManager } from '@common/transaction-manager/transaction.manager';
import { TransactionHandle } from '@common/transaction-manager/transaction.types';
import { ErrorCode, RepositoryException } from '@common/exception';
import { IOrderRepository } from '../domain/interfaces/order.repository.interface';
import { Order } from '../domain/entities/order.entity';

/**
 * Order Repository Implementation (In-Memory)
 */
@Injectable()
export class OrderMemoryRepository implements IOrderRepository {
  private orders: Map<number, Order> = new Map();
  private currentId = 1;

  constructor(private readonly transactionManager: TransactionManager) {}

  // ANCHOR findById
  async findById(id: number, tx?: TransactionHandle): Promise<Order | null> {
    return this.transactionManager.read(
      tx,
      () => this.orders.get(id)?.clone() ?? null,
    );
  }

  // ANCHOR create
  async create(order: Order, tx?: TransactionHandle): Promise<Order> {
    return this.transactionManager.write(tx, () => {
      const newOrder = new Order(
        this.currentId++,
        order.customerName,
        [...order.items],
        order.status,
        new Date(order.createdAt.getTime()),
        new Date(order.updatedAt.getTime()),
      );
      this.orders.set(newOrder.id, newOrder);
      return newOrder.clone();
    });
  }

  // ANCHOR update
  async update(order: Order, tx?: TransactionHandle): Promise<Order> {
    return this.transactionManager.write(tx, () => {
      if (!this.orders.has(order.id)) {
        throw new RepositoryException(ErrorCode.ORDER_NOT_FOUND);
      }
      const stored = order.clone();
      stored.updatedAt = new Date();
      this.orders.set(stored.id, stored);
      return stored.clone();
    });
  }
}
