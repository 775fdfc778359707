import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsNumber, IsOptional, IsString, Max } from 'class-validator';
import { CreateProductCommand } from '@/product/application/dto/create-product.dto';
import { ProductItemResponse } from './product.response';

/**
 * 상품 등록 요청 DTO
 * 형식만 확인하고, 값의 범위는 유스케이스가 다시 검증한다.
 */
export class CreateProductRequest {
  @ApiProperty({
    description: '상품 ID (생략 시 다음 ID 사용)',
    example: 1,
    required: false,
  })
  @IsOptional()
  @IsInt()
  @Max(Number.MAX_SAFE_INTEGER)
  id?: number;

  @ApiProperty({ description: '상품명', example: 'Widget' })
  @IsString()
  name!: string;

  @ApiProperty({ description: '단가', example: 9.99, minimum: 0 })
  @IsNumber()
  price!: number;

  @ApiProperty({ description: '초기 재고', example: 10, minimum: 0 })
  @IsInt()
  @Max(Number.MAX_SAFE_INTEGER)
  stock!: number;

  static toCommand(
    productId: number,
    dto: CreateProductRequest,
  ): CreateProductCommand {
    return new CreateProductCommand(productId, dto.name, dto.price, dto.stock);
  }
}

/**
 * 상품 등록 응답 DTO
 */
export class CreateProductResponse {
  @ApiProperty({ description: '등록된 상품', type: ProductItemResponse })
  data!: ProductItemResponse;
}
