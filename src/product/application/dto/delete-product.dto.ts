/**
 * 애플리케이션 레이어 DTO: DeleteProduct 요청
 */
export class DeleteProductCommand {
  constructor(public readonly productId: number) {}
}

export type DeleteProductResult =
  | { status: 'OK' }
  | { status: 'NOT_FOUND' }
  | { status: 'ERROR' };

/**
 * 애플리케이션 레이어 DTO: DeleteProductsByName 요청
 */
export class DeleteProductsByNameCommand {
  constructor(public readonly name: string) {}
}

export type DeleteProductsByNameResult =
  | { status: 'OK'; deleted: number }
  | { status: 'NOT_FOUND' }
  | { status: 'ERROR' };
