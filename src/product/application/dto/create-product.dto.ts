import { ErrorCodeEntry } from '@common/exception';
import { ProductResult } from './product.result';

/**
 * 애플리케이션 레이어 DTO: CreateProduct 요청
 */
export class CreateProductCommand {
  constructor(
    public readonly id: number,
    public readonly name: string,
    public readonly price: number,
    public readonly stock: number,
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: CreateProduct 결과
 * INVALID는 어떤 필드가 거부되었는지 errorCode로 알려준다.
 */
export type CreateProductResult =
  | { status: 'OK'; product: ProductResult }
  | { status: 'INVALID'; errorCode: ErrorCodeEntry }
  | { status: 'EXISTS' }
  | { status: 'ERROR' };
