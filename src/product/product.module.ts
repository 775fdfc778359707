import { Module } from '@nestjs/common';
import { ProductDomainService } from '@/product/domain/services/product.service';
import { IProductRepository } from '@/product/domain/interfaces/product.repository.interface';
import { ProductRepository } from '@/product/infrastructure/product.repository';
import { CatalogSnapshotLoader } from '@/product/infrastructure/catalog-snapshot.loader';
import { ProductController } from '@/product/presentation/product.controller';

// Use Cases
import { GetProductsUseCase } from '@/product/application/get-products.use-case';
import { GetLowStockProductsUseCase } from '@/product/application/get-low-stock-products.use-case';
import { GetNextProductIdUseCase } from '@/product/application/get-next-product-id.use-case';
import { CreateProductUseCase } from '@/product/application/create-product.use-case';
import { SellProductUseCase } from '@/product/application/sell-product.use-case';
import { DeleteProductUseCase } from '@/product/application/delete-product.use-case';
import { DeleteProductsByNameUseCase } from '@/product/application/delete-products-by-name.use-case';
import { SeedCatalogUseCase } from '@/product/application/seed-catalog.use-case';
import { BootstrapCatalogUseCase } from '@/product/application/bootstrap-catalog.use-case';
import { ProductFacade } from '@/product/application/product.facade';

/**
 * Product Module
 * 카탈로그 저장소와 재고 트랜잭션 기능 모듈
 */
@Module({
  imports: [],
  controllers: [ProductController],
  providers: [
    // Product Repository
    {
      provide: IProductRepository,
      useClass: ProductRepository,
    },
    CatalogSnapshotLoader,

    // Domain Service
    ProductDomainService,

    // Use Cases
    GetProductsUseCase,
    GetLowStockProductsUseCase,
    GetNextProductIdUseCase,
    CreateProductUseCase,
    SellProductUseCase,
    DeleteProductUseCase,
    DeleteProductsByNameUseCase,
    SeedCatalogUseCase,
    BootstrapCatalogUseCase,

    // Facade
    ProductFacade,
  ],
  exports: [ProductFacade],
})
export class ProductModule {}
