import { Injectable } from '@nestjs/common';
import { IProductRepository } from '@/product/domain/interfaces/product.repository.interface';
import { Product } from '../entities/product.entity';
import {
  ErrorCode,
  DomainException,
  ValidationException,
} from '@common/exception';

/**
 * ProductDomainService
 * 카탈로그 영속성 계층과 상호작용하며 재고 관련 핵심 비즈니스 규칙을 담당한다.
 * 원자성이 필요한 호출은 유스케이스가 트랜잭션을 열고 그 안에서 호출한다.
 */
@Injectable()
export class ProductDomainService {
  constructor(private readonly productRepository: IProductRepository) {}

  /**
   * ANCHOR 전체 상품 목록 조회
   */
  async getProducts(): Promise<Product[]> {
    return this.productRepository.findAll();
  }

  /**
   * ANCHOR 재고 부족 상품 조회 (stock <= threshold)
   */
  async getLowStockProducts(threshold: number): Promise<Product[]> {
    if (!Number.isSafeInteger(threshold) || threshold < 0) {
      throw new ValidationException(ErrorCode.INVALID_THRESHOLD);
    }
    return this.productRepository.findLowStock(threshold);
  }

  /**
   * ANCHOR 상품 단건 조회
   */
  async getProduct(productId: number): Promise<Product> {
    const product = await this.productRepository.findById(productId);
    if (!product) {
      throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
    }
    return product;
  }

  /**
   * ANCHOR 상품 등록
   * 같은 ID가 이미 있으면 덮어쓰지 않는다.
   */
  async registerProduct(product: Product): Promise<Product> {
    const existing = await this.productRepository.findById(product.id);
    if (existing) {
      throw new DomainException(ErrorCode.PRODUCT_ALREADY_EXISTS);
    }
    return this.productRepository.create(product);
  }

  /**
   * ANCHOR 상품 판매 (재고 차감)
   * @returns 차감 후 상품
   */
  async sellProduct(productId: number, quantity: number): Promise<Product> {
    if (!Product.isValidQuantity(quantity)) {
      throw new DomainException(ErrorCode.INVALID_QUANTITY);
    }

    const product = await this.getProduct(productId);
    product.sell(quantity);
    await this.productRepository.updateStock(product.id, product.stock);

    return product;
  }

  /**
   * ANCHOR 상품 삭제 (ID)
   */
  async removeProduct(productId: number): Promise<void> {
    const deleted = await this.productRepository.deleteById(productId);
    if (deleted === 0) {
      throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
    }
  }

  /**
   * ANCHOR 상품 삭제 (이름)
   * 이름은 유일하지 않으므로 일치하는 상품을 모두 삭제한다.
   * @returns 삭제된 상품 수
   */
  async removeProductsByName(name: string): Promise<number> {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
    }

    const deleted = await this.productRepository.deleteByName(trimmed);
    if (deleted === 0) {
      throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
    }
    return deleted;
  }

  /**
   * ANCHOR 다음 상품 ID 제안
   * 예약하지 않는다. 실제 중복 방지는 registerProduct의 존재 확인이 담당한다.
   */
  async suggestNextId(): Promise<number> {
    const maxId = await this.productRepository.findMaxId();
    return (maxId ?? 0) + 1;
  }

  /**
   * ANCHOR 상품 일괄 upsert (시드)
   */
  async upsertProducts(products: Product[]): Promise<number> {
    for (const product of products) {
      await this.productRepository.upsert(product);
    }
    return products.length;
  }
}
