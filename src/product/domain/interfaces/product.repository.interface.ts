import { Product } from '@/product/domain/entities/product.entity';

/**
 * Product Repository Port
 * 카탈로그 저장소 접근 계약. 트랜잭션 경계는 호출하는 쪽(유스케이스)이 연다.
 */
export abstract class IProductRepository {
  /**
   * 테이블이 없을 때만 생성한다. 여러 번 호출해도 안전하다.
   */
  abstract initialize(): Promise<void>;
  abstract findAll(): Promise<Product[]>;
  abstract findLowStock(threshold: number): Promise<Product[]>;
  abstract findById(id: number): Promise<Product | null>;
  abstract findMaxId(): Promise<number | null>;
  abstract create(product: Product): Promise<Product>;
  abstract updateStock(id: number, stock: number): Promise<void>;
  /**
   * @returns 삭제된 행 수
   */
  abstract deleteById(id: number): Promise<number>;
  /**
   * 대소문자를 구분하지 않는 정확한 이름 일치. 일치하는 모든 행을 삭제한다.
   * @returns 삭제된 행 수
   */
  abstract deleteByName(name: string): Promise<number>;
  /**
   * id 기준 insert-or-replace
   */
  abstract upsert(product: Product): Promise<void>;
}
