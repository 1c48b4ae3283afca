import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { OrderStatus } from '@/order/domain/entities/order-status.vo';
import {
  ErrorCode,
  DomainException,
  ValidationException,
} from '@common/exception';

const CREATED_AT = new Date('2024-01-01T00:00:00Z');

function confirmedOrder(items: Array<[number, number]>): Order {
  return new Order(
    1,
    'John',
    items.map(([productId, quantity]) => new OrderItem(productId, quantity)),
    OrderStatus.CONFIRMED,
    CREATED_AT,
    CREATED_AT,
  );
}

function itemsOf(order: Order): Array<[number, number]> {
  return order.items.map((item): [number, number] => [
    item.productId,
    item.quantity,
  ]);
}

describe('Order Entity', () => {
  describe('생성자', () => {
    it('고객명이 공백이면 INVALID_CUSTOMER_NAME 예외를 던진다', () => {
      expect(
        () =>
          new Order(0, '  ', [], OrderStatus.CONFIRMED, CREATED_AT, CREATED_AT),
      ).toThrow(new ValidationException(ErrorCode.INVALID_CUSTOMER_NAME));
    });
  });

  describe('confirmed', () => {
    it('CONFIRMED 상태와 같은 생성/수정 시각으로 만들고 중복 항목을 그대로 보존한다', () => {
      const items = [new OrderItem(1, 3), new OrderItem(1, 2)];

      const order = Order.confirmed('John', items, CREATED_AT);

      expect(order.id).toBe(0);
      expect(order.status).toBe(OrderStatus.CONFIRMED);
      expect(order.createdAt).toBe(CREATED_AT);
      expect(order.updatedAt).toBe(CREATED_AT);
      expect(itemsOf(order)).toEqual([
        [1, 3],
        [1, 2],
      ]);
    });
  });

  describe('heldQuantities', () => {
    it('상품별 보유 수량을 합산한다', () => {
      const order = confirmedOrder([
        [1, 2],
        [2, 1],
        [1, 3],
      ]);

      expect(order.heldQuantities()).toEqual(
        new Map([
          [1, 5],
          [2, 1],
        ]),
      );
    });
  });

  describe('cancel', () => {
    it('CONFIRMED 주문을 CANCELLED로 바꾸고 항목별 복원 수량을 반환한다', () => {
      const order = confirmedOrder([
        [1, 3],
        [2, 2],
        [1, 1],
      ]);

      const restorations = order.cancel();

      expect(order.status).toBe(OrderStatus.CANCELLED);
      expect(restorations).toEqual([
        { productId: 1, quantity: 3 },
        { productId: 2, quantity: 2 },
        { productId: 1, quantity: 1 },
      ]);
    });

    it('이미 취소된 주문이면 INVALID_ORDER_STATUS 예외를 던진다', () => {
      const order = confirmedOrder([[1, 1]]);
      order.cancel();

      expect(() => order.cancel()).toThrow(
        new DomainException(ErrorCode.INVALID_ORDER_STATUS),
      );
    });
  });

  describe('applyReturn', () => {
    it('서로 다른 상품의 일부를 반품하면 각 항목 수량을 줄인다', () => {
      const order = confirmedOrder([
        [1, 4],
        [2, 3],
      ]);

      const restorations = order.applyReturn([
        { productId: 1, quantity: 2 },
        { productId: 2, quantity: 1 },
      ]);

      expect(itemsOf(order)).toEqual([
        [1, 2],
        [2, 2],
      ]);
      expect(restorations).toEqual([
        { productId: 1, quantity: 2 },
        { productId: 2, quantity: 1 },
      ]);
      expect(order.status).toBe(OrderStatus.CONFIRMED);
    });

    it('항목 수량과 같은 양을 반품하면 항목을 제거한다', () => {
      const order = confirmedOrder([
        [1, 2],
        [2, 1],
      ]);

      order.applyReturn([{ productId: 1, quantity: 2 }]);

      expect(itemsOf(order)).toEqual([[2, 1]]);
    });

    it('첫 항목이 다 흡수하지 못한 반품 수량은 같은 상품의 다음 항목으로 이월된다', () => {
      const order = confirmedOrder([
        [1, 2],
        [2, 1],
        [1, 3],
      ]);

      const restorations = order.applyReturn([{ productId: 1, quantity: 4 }]);

      expect(itemsOf(order)).toEqual([
        [2, 1],
        [1, 1],
      ]);
      expect(restorations).toEqual([
        { productId: 1, quantity: 2 },
        { productId: 1, quantity: 2 },
      ]);
    });

    it('같은 상품의 반품 요청이 여러 개면 합산해서 한 번만 적용한다', () => {
      const order = confirmedOrder([
        [1, 5],
        [1, 5],
      ]);

      const restorations = order.applyReturn([
        { productId: 1, quantity: 3 },
        { productId: 1, quantity: 4 },
      ]);

      expect(itemsOf(order)).toEqual([[1, 3]]);
      expect(restorations).toEqual([
        { productId: 1, quantity: 5 },
        { productId: 1, quantity: 2 },
      ]);
    });

    it('왼쪽 항목부터 반품을 흡수한다', () => {
      const order = confirmedOrder([
        [1, 3],
        [1, 3],
      ]);

      order.applyReturn([{ productId: 1, quantity: 1 }]);

      expect(itemsOf(order)).toEqual([
        [1, 2],
        [1, 3],
      ]);
    });

    it('모든 항목을 반품해도 CONFIRMED 상태로 남는다', () => {
      const order = confirmedOrder([[1, 2]]);

      order.applyReturn([{ productId: 1, quantity: 2 }]);

      expect(order.items).toEqual([]);
      expect(order.status).toBe(OrderStatus.CONFIRMED);
    });

    it('보유 수량을 초과하면 RETURN_QUANTITY_EXCEEDED 예외를 던지고 항목은 그대로다', () => {
      const order = confirmedOrder([[1, 2]]);

      expect(() => order.applyReturn([{ productId: 1, quantity: 3 }])).toThrow(
        new ValidationException(ErrorCode.RETURN_QUANTITY_EXCEEDED),
      );
      expect(itemsOf(order)).toEqual([[1, 2]]);
    });

    it('합산한 반품 수량이 보유 수량을 초과해도 예외를 던진다', () => {
      const order = confirmedOrder([[1, 3]]);

      expect(() =>
        order.applyReturn([
          { productId: 1, quantity: 2 },
          { productId: 1, quantity: 2 },
        ]),
      ).toThrow(new ValidationException(ErrorCode.RETURN_QUANTITY_EXCEEDED));
    });

    it('주문에 없는 상품을 반품하면 예외를 던진다', () => {
      const order = confirmedOrder([[1, 3]]);

      expect(() => order.applyReturn([{ productId: 9, quantity: 1 }])).toThrow(
        new ValidationException(ErrorCode.RETURN_QUANTITY_EXCEEDED),
      );
    });

    it('취소된 주문이면 INVALID_ORDER_STATUS 예외를 던진다', () => {
      const order = confirmedOrder([[1, 3]]);
      order.cancel();

      expect(() => order.applyReturn([{ productId: 1, quantity: 1 }])).toThrow(
        new DomainException(ErrorCode.INVALID_ORDER_STATUS),
      );
    });
  });

  describe('clone', () => {
    it('복사본의 항목을 바꿔도 원본은 그대로다', () => {
      const order = confirmedOrder([[1, 3]]);

      const copy = order.clone();
      copy.applyReturn([{ productId: 1, quantity: 1 }]);

      expect(itemsOf(copy)).toEqual([[1, 2]]);
      expect(itemsOf(order)).toEqual([[1, 3]]);
    });
  });
});
