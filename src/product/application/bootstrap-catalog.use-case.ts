import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { getCatalogConfig } from '@common/config/app.config';
import { CatalogSnapshotLoader } from '@/product/infrastructure/catalog-snapshot.loader';
import { ProductFacade } from './product.facade';

/**
 * 기동 시 카탈로그 시드
 * 시드 파일이 설정되어 있고 카탈로그가 비어 있을 때만 스냅샷을 반영한다.
 * 환경변수: CATALOG_SEED_FILE
 */
@Injectable()
export class BootstrapCatalogUseCase implements OnApplicationBootstrap {
  private readonly logger = new Logger(BootstrapCatalogUseCase.name);

  constructor(
    private readonly productFacade: ProductFacade,
    private readonly snapshotLoader: CatalogSnapshotLoader,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.execute(getCatalogConfig().seedFile);
  }

  /**
   * @returns 시드가 반영되었는지 여부
   */
  async execute(seedFile: string | null): Promise<boolean> {
    if (!seedFile) {
      return false;
    }

    const existing = await this.productFacade.listAll();
    if (existing.length > 0) {
      this.logger.log(
        `카탈로그에 상품 ${existing.length}개가 있어 시드를 건너뜀`,
      );
      return false;
    }

    const snapshot = await this.snapshotLoader.load(seedFile);
    const committed = await this.productFacade.seed(snapshot);
    if (!committed) {
      this.logger.warn(`시드 스냅샷에서 반영된 상품이 없음 - path: ${seedFile}`);
    }
    return committed;
  }
}
