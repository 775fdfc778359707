import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { GetLowStockProductsQuery } from './dto/get-products.dto';
import { ProductResult } from './dto/product.result';

@Injectable()
export class GetLowStockProductsUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  /**
   * ANCHOR 재고 부족 상품 조회
   * 음수 또는 정수가 아닌 임계값은 ValidationException
   */
  async execute(query: GetLowStockProductsQuery): Promise<ProductResult[]> {
    const products = await this.productService.getLowStockProducts(
      query.threshold,
    );

    return products.map((product) => ProductResult.fromDomain(product));
  }
}
