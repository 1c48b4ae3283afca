import { ErrorCode, DomainException, ValidationException } from '@common/exception';

/**
 * Product Entity
 */
export class Product {
  constructor(
    public readonly id: number,
    public name: string,
    public readonly sku: string,
    public price: number,
    public stock: number,
  ) {
    this.validateName();
    this.validateSku();
    this.validatePrice();
    this.validateStock();
  }

  private validateName(): void {
    if (this.name.trim().length === 0) {
      throw new ValidationException(ErrorCode.INVALID_PRODUCT_NAME);
    }
  }

  private validateSku(): void {
    if (this.sku.trim().length === 0) {
      throw new ValidationException(ErrorCode.INVALID_SKU);
    }
  }

  /**
   * ANCHOR 가격 검증
   */
  private validatePrice(): void {
    if (!Number.isFinite(this.price) || this.price < 0) {
      throw new ValidationException(ErrorCode.INVALID_PRICE);
    }
  }

  /**
   * ANCHOR 재고 유효성
   */
  private validateStock(): void {
    if (!Number.isInteger(this.stock) || this.stock < 0) {
      throw new ValidationException(ErrorCode.INVALID_STOCK_QUANTITY);
    }
  }

  private validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new ValidationException(ErrorCode.INVALID_QUANTITY);
    }
  }

  /**
   * ANCHOR 재고 보유 여부
   */
  hasStock(quantity: number): boolean {
    return this.stock >= quantity;
  }

  /**
   * ANCHOR 재고 차감 (주문 생성 시)
   */
  decreaseStock(quantity: number): void {
    this.validateQuantity(quantity);
    if (!this.hasStock(quantity)) {
      throw new DomainException(ErrorCode.INSUFFICIENT_STOCK);
    }
    this.stock -= quantity;
  }

  /**
   * ANCHOR 재고 복원 (주문 취소/부분 반품 시)
   */
  increaseStock(quantity: number): void {
    this.validateQuantity(quantity);
    this.stock += quantity;
  }

  /**
   * ANCHOR 상품 정보 수정
   * SKU는 변경하지 않는다.
   */
  changeDetails(name: string, price: number, stock: number): void {
    this.name = name;
    this.price = price;
    this.stock = stock;
    this.validateName();
    this.validatePrice();
    this.validateStock();
  }

  clone(): Product {
    return new Product(this.id, this.name, this.sku, this.price, this.stock);
  }
}
