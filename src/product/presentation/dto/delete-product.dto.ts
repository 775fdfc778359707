import { ApiProperty } from '@nestjs/swagger';
import { IsString } from 'class-validator';
import {
  DeleteProductCommand,
  DeleteProductsByNameCommand,
} from '@/product/application/dto/delete-product.dto';

/**
 * 상품 삭제 요청 DTO (ID)
 */
export class DeleteProductRequest {
  static toCommand(productId: number): DeleteProductCommand {
    return new DeleteProductCommand(productId);
  }
}

/**
 * 상품 삭제 요청 DTO (이름)
 */
export class DeleteProductsByNameRequest {
  @ApiProperty({
    description: '삭제할 상품명 (대소문자 무시, 정확히 일치)',
    example: 'Widget',
  })
  @IsString()
  name!: string;

  static toCommand(
    dto: DeleteProductsByNameRequest,
  ): DeleteProductsByNameCommand {
    return new DeleteProductsByNameCommand(dto.name);
  }
}

class DeletedCount {
  @ApiProperty({ description: '삭제된 상품 수', example: 1 })
  deleted!: number;
}

/**
 * 상품 이름 삭제 응답 DTO
 */
export class DeleteProductsByNameResponse {
  @ApiProperty({ type: DeletedCount })
  data!: DeletedCount;
}
