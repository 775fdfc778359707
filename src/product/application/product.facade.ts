import { Injectable } from '@nestjs/common';
import { GetProductsUseCase } from './get-products.use-case';
import { GetLowStockProductsUseCase } from './get-low-stock-products.use-case';
import { GetNextProductIdUseCase } from './get-next-product-id.use-case';
import { CreateProductUseCase } from './create-product.use-case';
import { SellProductUseCase } from './sell-product.use-case';
import { DeleteProductUseCase } from './delete-product.use-case';
import { DeleteProductsByNameUseCase } from './delete-products-by-name.use-case';
import { SeedCatalogUseCase } from './seed-catalog.use-case';
import {
  GetLowStockProductsQuery,
  GetProductsQuery,
} from './dto/get-products.dto';
import { ProductResult } from './dto/product.result';
import {
  CreateProductCommand,
  CreateProductResult,
} from './dto/create-product.dto';
import {
  SellProductCommand,
  SellProductResult,
} from './dto/sell-product.dto';
import {
  DeleteProductCommand,
  DeleteProductResult,
  DeleteProductsByNameCommand,
  DeleteProductsByNameResult,
} from './dto/delete-product.dto';
import { SeedCatalogCommand } from './dto/seed-catalog.dto';

// PRODUCT FACADE

/**
 * 카탈로그 작업 계약
 * HTTP 외의 호출자(CLI, 자연어 어시스턴트 등)는 이 파사드만 사용한다.
 * 모든 입력은 유스케이스에서 다시 검증되며 저장소에 직접 접근할 경로는 없다.
 */
@Injectable()
export class ProductFacade {
  constructor(
    private readonly getProductsUseCase: GetProductsUseCase,
    private readonly getLowStockProductsUseCase: GetLowStockProductsUseCase,
    private readonly getNextProductIdUseCase: GetNextProductIdUseCase,
    private readonly createProductUseCase: CreateProductUseCase,
    private readonly sellProductUseCase: SellProductUseCase,
    private readonly deleteProductUseCase: DeleteProductUseCase,
    private readonly deleteProductsByNameUseCase: DeleteProductsByNameUseCase,
    private readonly seedCatalogUseCase: SeedCatalogUseCase,
  ) {}

  async listAll(): Promise<ProductResult[]> {
    return this.getProductsUseCase.execute(new GetProductsQuery());
  }

  async listLowStock(threshold: number): Promise<ProductResult[]> {
    return this.getLowStockProductsUseCase.execute(
      new GetLowStockProductsQuery(threshold),
    );
  }

  async create(
    id: number,
    name: string,
    price: number,
    stock: number,
  ): Promise<CreateProductResult> {
    return this.createProductUseCase.execute(
      new CreateProductCommand(id, name, price, stock),
    );
  }

  async delete(id: number): Promise<DeleteProductResult> {
    return this.deleteProductUseCase.execute(new DeleteProductCommand(id));
  }

  async deleteByName(name: string): Promise<DeleteProductsByNameResult> {
    return this.deleteProductsByNameUseCase.execute(
      new DeleteProductsByNameCommand(name),
    );
  }

  async sell(id: number, quantity: number): Promise<SellProductResult> {
    return this.sellProductUseCase.execute(
      new SellProductCommand(id, quantity),
    );
  }

  async nextId(): Promise<number> {
    return this.getNextProductIdUseCase.execute();
  }

  /**
   * @returns 한 행 이상 반영되었는지 여부
   */
  async seed(rows: unknown): Promise<boolean> {
    const result = await this.seedCatalogUseCase.execute(
      new SeedCatalogCommand(rows),
    );
    return result.committed;
  }
}
