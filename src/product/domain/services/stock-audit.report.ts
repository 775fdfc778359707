import { ProductProps } from '@/product/domain/entities/product.entity';

const RULE = '==============================';

/**
 * 재고 부족 감사 리포트 문자열 생성
 */
export function buildStockAuditReport(
  products: ReadonlyArray<Pick<ProductProps, 'name' | 'stock'>>,
  threshold: number,
  now: Date = new Date(),
): string {
  const lines = [
    RULE,
    'STOCK ALERT',
    `Timestamp: ${now.toISOString()}`,
    `Threshold: ${threshold}`,
    RULE,
  ];

  if (products.length === 0) {
    lines.push('No products with low stock.');
  } else {
    for (const product of products) {
      lines.push(`- ${product.name} | stock: ${product.stock}`);
    }
  }

  return lines.join('\n') + '\n';
}
