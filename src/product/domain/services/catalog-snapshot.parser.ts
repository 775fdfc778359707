import { Product } from '@/product/domain/entities/product.entity';
import { ValidationException } from '@common/exception';

export interface SkippedSnapshotRow {
  key: string;
  reason: string;
}

export interface ParsedCatalogSnapshot {
  products: Product[];
  skipped: SkippedSnapshotRow[];
}

type SnapshotRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is SnapshotRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * 숫자 또는 숫자 문자열만 허용한다. 그 외에는 null.
 */
const toNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * ANCHOR 스냅샷 행 하나를 Product로 변환
 * 가격/재고가 없으면 0으로 간주하고, 숫자가 아니면 그 행을 건너뛴다.
 */
const parseRow = (
  key: string,
  raw: unknown,
  fallbackId: unknown,
): Product | SkippedSnapshotRow => {
  if (!isRecord(raw)) {
    return { key, reason: 'record is not an object' };
  }

  const id = toNumber(raw.id ?? fallbackId);
  if (id === null) {
    return { key, reason: 'id is not numeric' };
  }
  const name = raw.name;
  if (typeof name !== 'string' || name.trim() === '') {
    return { key, reason: 'name is missing' };
  }
  const price = raw.price === undefined ? 0 : toNumber(raw.price);
  if (price === null) {
    return { key, reason: 'price is not numeric' };
  }
  const stock = raw.stock === undefined ? 0 : toNumber(raw.stock);
  if (stock === null) {
    return { key, reason: 'stock is not numeric' };
  }

  try {
    return new Product(id, name, price, stock);
  } catch (error) {
    if (error instanceof ValidationException) {
      return { key, reason: error.errorCode.message };
    }
    throw error;
  }
};

/**
 * 외부 스냅샷 문서를 Product 목록으로 변환한다.
 * - 배열: 각 원소가 `{ id, name, price, stock }` 레코드
 * - 객체: id 형태의 키 → 레코드 매핑 (레코드에 id가 없으면 키를 사용)
 * 잘못된 행은 건너뛰고 skipped에 사유와 함께 모은다.
 */
export function parseCatalogSnapshot(source: unknown): ParsedCatalogSnapshot {
  const entries: Array<[string, unknown, unknown]> = Array.isArray(source)
    ? source.map((row, index): [string, unknown, unknown] => [
        String(index),
        row,
        undefined,
      ])
    : isRecord(source)
      ? Object.entries(source).map(([key, row]): [string, unknown, unknown] => [
          key,
          row,
          key,
        ])
      : [];

  const products: Product[] = [];
  const skipped: SkippedSnapshotRow[] = [];

  for (const [key, raw, fallbackId] of entries) {
    const parsed = parseRow(key, raw, fallbackId);
    if (parsed instanceof Product) {
      products.push(parsed);
    } else {
      skipped.push(parsed);
    }
  }

  return { products, skipped };
}
