import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsOptional } from 'class-validator';
import { Type } from 'class-transformer';
import {
  GetLowStockProductsQuery,
  GetProductsQuery,
} from '@/product/application/dto/get-products.dto';
import { ProductItemResponse } from './product.response';

/**
 * 상품 목록 조회 요청 DTO
 */
export class GetProductsRequest {
  static toQuery(): GetProductsQuery {
    return new GetProductsQuery();
  }
}

/**
 * 재고 부족 상품 조회 요청 DTO
 * 범위 검증(0 이상)은 도메인에서 한다.
 */
export class GetLowStockProductsRequest {
  @ApiProperty({
    description: '재고 임계값 (stock <= threshold)',
    example: 5,
    required: false,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  threshold?: number;

  static toQuery(
    dto: GetLowStockProductsRequest,
    defaultThreshold: number,
  ): GetLowStockProductsQuery {
    return new GetLowStockProductsQuery(dto.threshold ?? defaultThreshold);
  }
}

/**
 * 상품 목록 조회 응답 DTO
 */
export class GetProductsResponse {
  @ApiProperty({
    description: '상품 목록',
    type: [ProductItemResponse],
  })
  data!: ProductItemResponse[];
}
