import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { GetProductsQuery } from './dto/get-products.dto';
import { ProductResult } from './dto/product.result';

@Injectable()
export class GetProductsUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  /**
   * ANCHOR 전체 상품 목록 조회
   */
  async execute(query: GetProductsQuery): Promise<ProductResult[]> {
    const products = await this.productService.getProducts();

    return products.map((product) => ProductResult.fromDomain(product));
  }
}
