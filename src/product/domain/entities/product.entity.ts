import {
  ErrorCode,
  DomainException,
  ValidationException,
} from '@common/exception';

export interface ProductProps {
  id: number;
  name: string;
  price: number;
  stock: number;
}

/**
 * Product Entity
 * 카탈로그의 유일한 엔티티. 생성 시점에 모든 불변식을 검증한다.
 */
export class Product {
  public readonly name: string;

  constructor(
    public readonly id: number,
    name: string,
    public readonly price: number,
    public stock: number,
  ) {
    this.name = name.trim();
    this.validate();
  }

  static from(props: ProductProps): Product {
    return new Product(props.id, props.name, props.price, props.stock);
  }

  /**
   * ANCHOR 필드 검증
   */
  private validate(): void {
    if (!Number.isSafeInteger(this.id) || this.id <= 0) {
      throw new ValidationException(ErrorCode.INVALID_PRODUCT_ID);
    }
    if (this.name.length === 0) {
      throw new ValidationException(ErrorCode.INVALID_PRODUCT_NAME);
    }
    if (!Number.isFinite(this.price) || this.price < 0) {
      throw new ValidationException(ErrorCode.INVALID_PRICE);
    }
    if (!Number.isSafeInteger(this.stock) || this.stock < 0) {
      throw new ValidationException(ErrorCode.INVALID_STOCK_QUANTITY);
    }
  }

  /**
   * ANCHOR 판매 (재고 차감)
   * 재고가 판매 수량보다 적으면 차감하지 않는다.
   */
  sell(quantity: number): void {
    if (!Product.isValidQuantity(quantity)) {
      throw new DomainException(ErrorCode.INVALID_QUANTITY);
    }
    if (this.stock < quantity) {
      throw new DomainException(ErrorCode.INSUFFICIENT_STOCK);
    }
    this.stock -= quantity;
  }

  isLowStock(threshold: number): boolean {
    return this.stock <= threshold;
  }

  static isValidQuantity(quantity: number): boolean {
    return Number.isSafeInteger(quantity) && quantity > 0;
  }

  toProps(): ProductProps {
    return {
      id: this.id,
      name: this.name,
      price: this.price,
      stock: this.stock,
    };
  }
}
