/**
 * 애플리케이션 레이어 DTO: GetProducts 요청
 */
export class GetProductsQuery {}

/**
 * 애플리케이션 레이어 DTO: GetLowStockProducts 요청
 */
export class GetLowStockProductsQuery {
  constructor(public readonly threshold: number) {}
}
