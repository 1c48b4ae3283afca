/**
 * Order Domain Types
 * 주문 도메인에서 공통으로 사용되는 타입 정의
 */

/**
 * 주문/반품 항목 입력 데이터
 */
export interface OrderItemData {
  productId: number;
  quantity: number;
}
