import { Injectable, Logger } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { Product } from '@/product/domain/entities/product.entity';
import { SqliteService } from '@common/sqlite-manager/sqlite.service';
import {
  ErrorCode,
  DomainException,
  ValidationException,
} from '@common/exception';
import {
  CreateProductCommand,
  CreateProductResult,
} from './dto/create-product.dto';
import { ProductResult } from './dto/product.result';

@Injectable()
export class CreateProductUseCase {
  private readonly logger = new Logger(CreateProductUseCase.name);

  constructor(
    private readonly productService: ProductDomainService,
    private readonly sqlite: SqliteService,
  ) {}

  /**
   * ANCHOR 상품 등록
   * 필드 검증은 저장소 접근 전에 끝내고,
   * 존재 확인과 INSERT는 하나의 트랜잭션으로 묶어 같은 ID의 동시 등록을 막는다.
   */
  async execute(cmd: CreateProductCommand): Promise<CreateProductResult> {
    let product: Product;
    try {
      product = new Product(cmd.id, cmd.name, cmd.price, cmd.stock);
    } catch (error) {
      if (error instanceof ValidationException) {
        return { status: 'INVALID', errorCode: error.errorCode };
      }
      this.logger.error(
        `상품 검증 중 예기치 못한 오류 - productId: ${cmd.id}`,
        error instanceof Error ? error.stack : error,
      );
      return { status: 'ERROR' };
    }

    try {
      const created = await this.sqlite.runInTransaction(() =>
        this.productService.registerProduct(product),
      );
      return { status: 'OK', product: ProductResult.fromDomain(created) };
    } catch (error) {
      if (
        error instanceof DomainException &&
        error.errorCode === ErrorCode.PRODUCT_ALREADY_EXISTS
      ) {
        return { status: 'EXISTS' };
      }
      this.logger.error(
        `상품 등록 실패 - productId: ${cmd.id}`,
        error instanceof Error ? error.stack : error,
      );
      return { status: 'ERROR' };
    }
  }
}
