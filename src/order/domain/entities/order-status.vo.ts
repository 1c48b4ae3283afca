/**
 * OrderStatus Value Object
 * 주문 상태를 나타내는 값 객체
 */
export class OrderStatus {
  private constructor(public readonly value: string) {}

  // 예약된 상태. 현재 주문 생성 흐름은 곧바로 CONFIRMED로 만든다.
  static readonly PENDING = new OrderStatus('Pending');
  static readonly CONFIRMED = new OrderStatus('Confirmed');
  static readonly CANCELLED = new OrderStatus('Cancelled');

  isConfirmed(): boolean {
    return this === OrderStatus.CONFIRMED;
  }

  isCancelled(): boolean {
    return this === OrderStatus.CANCELLED;
  }
}
