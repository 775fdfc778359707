import { Injectable } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';

@Injectable()
export class GetNextProductIdUseCase {
  constructor(private readonly productService: ProductDomainService) {}

  /**
   * ANCHOR 다음 상품 ID 제안 (max(id) + 1, 비어 있으면 1)
   * 예약이 아니므로 호출자는 곧바로 상품 등록을 시도하고 EXISTS를 처리해야 한다.
   */
  async execute(): Promise<number> {
    return this.productService.suggestNextId();
  }
}
