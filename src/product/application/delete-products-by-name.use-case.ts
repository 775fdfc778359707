import { Injectable, Logger } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { SqliteService } from '@common/sqlite-manager/sqlite.service';
import { ErrorCode, DomainException } from '@common/exception';
import {
  DeleteProductsByNameCommand,
  DeleteProductsByNameResult,
} from './dto/delete-product.dto';

@Injectable()
export class DeleteProductsByNameUseCase {
  private readonly logger = new Logger(DeleteProductsByNameUseCase.name);

  constructor(
    private readonly productService: ProductDomainService,
    private readonly sqlite: SqliteService,
  ) {}

  /**
   * ANCHOR 상품 삭제 (이름, 대소문자 무시)
   * 일치하는 상품을 한 번의 DELETE로 모두 삭제한다.
   */
  async execute(
    cmd: DeleteProductsByNameCommand,
  ): Promise<DeleteProductsByNameResult> {
    const name = cmd.name.trim();
    if (name.length === 0) {
      return { status: 'NOT_FOUND' };
    }

    try {
      const deleted = await this.sqlite.runInTransaction(() =>
        this.productService.removeProductsByName(name),
      );
      return { status: 'OK', deleted };
    } catch (error) {
      if (
        error instanceof DomainException &&
        error.errorCode === ErrorCode.PRODUCT_NOT_FOUND
      ) {
        return { status: 'NOT_FOUND' };
      }
      this.logger.error(
        `상품 이름 삭제 실패 - name: ${cmd.name}`,
        error instanceof Error ? error.stack : error,
      );
      return { status: 'ERROR' };
    }
  }
}
