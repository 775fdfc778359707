import { ApiProperty } from '@nestjs/swagger';
import { IsInt, Max } from 'class-validator';
import { SellProductCommand } from '@/product/application/dto/sell-product.dto';

/**
 * 상품 판매 요청 DTO
 */
export class SellProductRequest {
  @ApiProperty({
    description: '판매 수량',
    example: 2,
    minimum: 1,
  })
  @IsInt()
  @Max(Number.MAX_SAFE_INTEGER)
  quantity!: number;

  static toCommand(
    productId: number,
    dto: SellProductRequest,
  ): SellProductCommand {
    return new SellProductCommand(productId, dto.quantity);
  }
}

/**
 * 판매 영수증 응답
 */
export class SaleReceiptResponse {
  @ApiProperty({ description: '상품 ID', example: 1 })
  productId!: number;

  @ApiProperty({ description: '상품명', example: 'Widget' })
  name!: string;

  @ApiProperty({ description: '판매 수량', example: 2 })
  quantity!: number;

  @ApiProperty({ description: '단가', example: 9.99 })
  unitPrice!: number;

  @ApiProperty({ description: '합계 (소수점 둘째 자리 반올림)', example: 19.98 })
  total!: number;

  @ApiProperty({ description: '판매 후 남은 재고', example: 8 })
  remainingStock!: number;
}

/**
 * 상품 판매 응답 DTO
 */
export class SellProductResponse {
  @ApiProperty({ description: '판매 영수증', type: SaleReceiptResponse })
  data!: SaleReceiptResponse;
}
