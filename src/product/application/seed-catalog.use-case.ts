import { Injectable, Logger } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { parseCatalogSnapshot } from '@/product/domain/services/catalog-snapshot.parser';
import { SqliteService } from '@common/sqlite-manager/sqlite.service';
import { SeedCatalogCommand, SeedCatalogResult } from './dto/seed-catalog.dto';

@Injectable()
export class SeedCatalogUseCase {
  private readonly logger = new Logger(SeedCatalogUseCase.name);

  constructor(
    private readonly productService: ProductDomainService,
    private readonly sqlite: SqliteService,
  ) {}

  /**
   * ANCHOR 카탈로그 시드 (id 기준 insert-or-replace)
   * 잘못된 행은 건너뛰고, 나머지는 하나의 트랜잭션으로 반영한다.
   * 같은 스냅샷으로 다시 실행해도 최종 상태는 같다.
   */
  async execute(cmd: SeedCatalogCommand): Promise<SeedCatalogResult> {
    const { products, skipped } = parseCatalogSnapshot(cmd.source);

    for (const row of skipped) {
      this.logger.warn(`시드 행 건너뜀 - key: ${row.key}, reason: ${row.reason}`);
    }

    if (products.length === 0) {
      return new SeedCatalogResult(false, 0, skipped.length);
    }

    try {
      const upserted = await this.sqlite.runInTransaction(() =>
        this.productService.upsertProducts(products),
      );
      this.logger.log(`카탈로그 시드 완료: ${upserted}개`);
      return new SeedCatalogResult(true, upserted, skipped.length);
    } catch (error) {
      this.logger.error(
        '카탈로그 시드 실패',
        error instanceof Error ? error.stack : error,
      );
      return new SeedCatalogResult(false, 0, skipped.length);
    }
  }
}
