import { Injectable, Logger } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { SqliteService } from '@common/sqlite-manager/sqlite.service';
import { ErrorCode, DomainException } from '@common/exception';
import {
  DeleteProductCommand,
  DeleteProductResult,
} from './dto/delete-product.dto';

@Injectable()
export class DeleteProductUseCase {
  private readonly logger = new Logger(DeleteProductUseCase.name);

  constructor(
    private readonly productService: ProductDomainService,
    private readonly sqlite: SqliteService,
  ) {}

  /**
   * ANCHOR 상품 삭제 (ID)
   */
  async execute(cmd: DeleteProductCommand): Promise<DeleteProductResult> {
    try {
      await this.sqlite.runInTransaction(() =>
        this.productService.removeProduct(cmd.productId),
      );
      return { status: 'OK' };
    } catch (error) {
      if (
        error instanceof DomainException &&
        error.errorCode === ErrorCode.PRODUCT_NOT_FOUND
      ) {
        return { status: 'NOT_FOUND' };
      }
      this.logger.error(
        `상품 삭제 실패 - productId: ${cmd.productId}`,
        error instanceof Error ? error.stack : error,
      );
      return { status: 'ERROR' };
    }
  }
}
