import { Product } from '@/product/domain/entities/product.entity';

/**
 * 애플리케이션 레이어 DTO: SellProduct 요청
 */
export class SellProductCommand {
  constructor(
    public readonly productId: number,
    public readonly quantity: number,
  ) {}
}

/**
 * 판매 영수증
 */
export class SaleReceipt {
  constructor(
    public readonly productId: number,
    public readonly name: string,
    public readonly quantity: number,
    public readonly unitPrice: number,
    public readonly total: number,
    public readonly remainingStock: number,
  ) {}

  /**
   * @param product 차감이 끝난 상품
   */
  static from(product: Product, quantity: number): SaleReceipt {
    const total = Math.round(product.price * quantity * 100) / 100;
    return new SaleReceipt(
      product.id,
      product.name,
      quantity,
      product.price,
      total,
      product.stock,
    );
  }
}

/**
 * 애플리케이션 레이어 DTO: SellProduct 결과
 */
export type SellProductResult =
  | { status: 'OK'; receipt: SaleReceipt }
  | { status: 'INVALID_QUANTITY' }
  | { status: 'NOT_FOUND' }
  | { status: 'INSUFFICIENT_STOCK' }
  | { status: 'ERROR' };
