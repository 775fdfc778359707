import { Injectable, Logger } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { Product } from '@/product/domain/entities/product.entity';
import { SqliteService } from '@common/sqlite-manager/sqlite.service';
import { ErrorCode, DomainException } from '@common/exception';
import {
  SaleReceipt,
  SellProductCommand,
  SellProductResult,
} from './dto/sell-product.dto';

@Injectable()
export class SellProductUseCase {
  private readonly logger = new Logger(SellProductUseCase.name);

  constructor(
    private readonly productService: ProductDomainService,
    private readonly sqlite: SqliteService,
  ) {}

  /**
   * ANCHOR 상품 판매
   * 재고 조회-검증-차감을 하나의 트랜잭션으로 실행한다.
   * 같은 상품에 대한 동시 판매는 직렬화되어 재고가 음수가 되지 않는다.
   */
  async execute(cmd: SellProductCommand): Promise<SellProductResult> {
    if (!Product.isValidQuantity(cmd.quantity)) {
      return { status: 'INVALID_QUANTITY' };
    }

    try {
      const product = await this.sqlite.runInTransaction(() =>
        this.productService.sellProduct(cmd.productId, cmd.quantity),
      );
      return {
        status: 'OK',
        receipt: SaleReceipt.from(product, cmd.quantity),
      };
    } catch (error) {
      if (error instanceof DomainException) {
        switch (error.errorCode.code) {
          case ErrorCode.PRODUCT_NOT_FOUND.code:
            return { status: 'NOT_FOUND' };
          case ErrorCode.INSUFFICIENT_STOCK.code:
            return { status: 'INSUFFICIENT_STOCK' };
          case ErrorCode.INVALID_QUANTITY.code:
            return { status: 'INVALID_QUANTITY' };
        }
      }
      this.logger.error(
        `상품 판매 실패 - productId: ${cmd.productId}, quantity: ${cmd.quantity}`,
        error instanceof Error ? error.stack : error,
      );
      return { status: 'ERROR' };
    }
  }
}
