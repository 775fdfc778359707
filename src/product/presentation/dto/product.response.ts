import { ApiProperty } from '@nestjs/swagger';

/**
 * 상품 응답 항목
 */
export class ProductItemResponse {
  @ApiProperty({ description: '상품 ID', example: 1 })
  id!: number;

  @ApiProperty({ description: '상품명', example: 'Widget' })
  name!: string;

  @ApiProperty({ description: '단가', example: 9.99 })
  price!: number;

  @ApiProperty({ description: '재고', example: 10 })
  stock!: number;
}
