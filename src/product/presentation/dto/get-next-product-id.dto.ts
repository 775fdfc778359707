import { ApiProperty } from '@nestjs/swagger';

class NextProductId {
  @ApiProperty({ description: '다음으로 사용할 수 있는 상품 ID', example: 6 })
  nextId!: number;
}

/**
 * 다음 상품 ID 조회 응답 DTO
 */
export class GetNextProductIdResponse {
  @ApiProperty({ type: NextProductId })
  data!: NextProductId;
}
