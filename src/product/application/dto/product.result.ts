import { Product } from '@/product/domain/entities/product.entity';

/**
 * 애플리케이션 레이어 DTO: 상품 조회 결과
 */
export class ProductResult {
  constructor(
    public readonly id: number,
    public readonly name: string,
    public readonly price: number,
    public readonly stock: number,
  ) {}

  static fromDomain(product: Product): ProductResult {
    return new ProductResult(
      product.id,
      product.name,
      product.price,
      product.stock,
    );
  }
}
