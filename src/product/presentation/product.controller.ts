import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import {
  ErrorCode,
  DomainException,
  RepositoryException,
  ValidationException,
} from '@common/exception';
import { getCatalogConfig } from '@common/config/app.config';

// DTOs
import {
  GetLowStockProductsRequest,
  GetProductsRequest,
  GetProductsResponse,
} from './dto/get-products.dto';
import {
  CreateProductRequest,
  CreateProductResponse,
} from './dto/create-product.dto';
import {
  SellProductRequest,
  SellProductResponse,
} from './dto/sell-product.dto';
import {
  DeleteProductRequest,
  DeleteProductsByNameRequest,
  DeleteProductsByNameResponse,
} from './dto/delete-product.dto';
import { GetNextProductIdResponse } from './dto/get-next-product-id.dto';

// Use Cases
import { GetProductsUseCase } from '@/product/application/get-products.use-case';
import { GetLowStockProductsUseCase } from '@/product/application/get-low-stock-products.use-case';
import { GetNextProductIdUseCase } from '@/product/application/get-next-product-id.use-case';
import { CreateProductUseCase } from '@/product/application/create-product.use-case';
import { SellProductUseCase } from '@/product/application/sell-product.use-case';
import { DeleteProductUseCase } from '@/product/application/delete-product.use-case';
import { DeleteProductsByNameUseCase } from '@/product/application/delete-products-by-name.use-case';

/**
 * Product Controller
 * 카탈로그 조회/등록/판매/삭제 API 엔드포인트
 * 유스케이스 결과를 예외로 바꾸고, HTTP 상태 코드는 전역 예외 필터가 정한다.
 */
@ApiTags('products')
@Controller('api/products')
export class ProductController {
  constructor(
    private readonly getProductsUseCase: GetProductsUseCase,
    private readonly getLowStockProductsUseCase: GetLowStockProductsUseCase,
    private readonly getNextProductIdUseCase: GetNextProductIdUseCase,
    private readonly createProductUseCase: CreateProductUseCase,
    private readonly sellProductUseCase: SellProductUseCase,
    private readonly deleteProductUseCase: DeleteProductUseCase,
    private readonly deleteProductsByNameUseCase: DeleteProductsByNameUseCase,
  ) {}

  /**
   * ANCHOR 상품 목록 조회
   */
  @Get()
  @ApiOperation({
    summary: '상품 목록 조회',
    description: '카탈로그의 모든 상품을 조회합니다.',
  })
  @ApiResponse({ status: 200, type: GetProductsResponse })
  async getProducts(): Promise<GetProductsResponse> {
    const query = GetProductsRequest.toQuery();
    const result = await this.getProductsUseCase.execute(query);

    return { data: result };
  }

  /**
   * ANCHOR 재고 부족 상품 조회
   * threshold 생략 시 STOCK_ALERT_THRESHOLD 사용
   */
  @Get('low-stock')
  @ApiOperation({
    summary: '재고 부족 상품 조회',
    description: '재고가 임계값 이하인 상품을 조회합니다.',
  })
  @ApiResponse({ status: 200, type: GetProductsResponse })
  @ApiResponse({ status: 400, description: '잘못된 임계값' })
  async getLowStockProducts(
    @Query() dto: GetLowStockProductsRequest,
  ): Promise<GetProductsResponse> {
    const query = GetLowStockProductsRequest.toQuery(
      dto,
      getCatalogConfig().stockAlertThreshold,
    );
    const result = await this.getLowStockProductsUseCase.execute(query);

    return { data: result };
  }

  /**
   * ANCHOR 다음 상품 ID 조회
   */
  @Get('next-id')
  @ApiOperation({
    summary: '다음 상품 ID 조회',
    description: '현재 최대 ID + 1을 돌려줍니다. 예약되지 않습니다.',
  })
  @ApiResponse({ status: 200, type: GetNextProductIdResponse })
  async getNextProductId(): Promise<GetNextProductIdResponse> {
    const nextId = await this.getNextProductIdUseCase.execute();

    return { data: { nextId } };
  }

  /**
   * ANCHOR 상품 등록
   */
  @Post()
  @ApiOperation({
    summary: '상품 등록',
    description: 'ID를 생략하면 다음 ID로 등록합니다.',
  })
  @ApiResponse({ status: 201, type: CreateProductResponse })
  @ApiResponse({ status: 400, description: '잘못된 상품 정보' })
  @ApiResponse({ status: 409, description: '이미 존재하는 상품 ID' })
  async createProduct(
    @Body() dto: CreateProductRequest,
  ): Promise<CreateProductResponse> {
    const productId = dto.id ?? (await this.getNextProductIdUseCase.execute());
    const command = CreateProductRequest.toCommand(productId, dto);
    const result = await this.createProductUseCase.execute(command);

    switch (result.status) {
      case 'OK':
        return { data: result.product };
      case 'INVALID':
        throw new ValidationException(result.errorCode);
      case 'EXISTS':
        throw new DomainException(ErrorCode.PRODUCT_ALREADY_EXISTS);
      case 'ERROR':
        throw new RepositoryException(ErrorCode.CATALOG_STORAGE_FAILURE);
    }
  }

  /**
   * ANCHOR 상품 판매
   */
  @Post(':productId/sales')
  @ApiOperation({
    summary: '상품 판매',
    description: '재고가 충분하면 차감하고 영수증을 돌려줍니다.',
  })
  @ApiParam({ name: 'productId', description: '상품 ID' })
  @ApiResponse({ status: 201, type: SellProductResponse })
  @ApiResponse({ status: 400, description: '재고 부족 또는 잘못된 수량' })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async sellProduct(
    @Param('productId', ParseIntPipe) productId: number,
    @Body() dto: SellProductRequest,
  ): Promise<SellProductResponse> {
    const command = SellProductRequest.toCommand(productId, dto);
    const result = await this.sellProductUseCase.execute(command);

    switch (result.status) {
      case 'OK':
        return { data: result.receipt };
      case 'INVALID_QUANTITY':
        throw new DomainException(ErrorCode.INVALID_QUANTITY);
      case 'NOT_FOUND':
        throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
      case 'INSUFFICIENT_STOCK':
        throw new DomainException(ErrorCode.INSUFFICIENT_STOCK);
      case 'ERROR':
        throw new RepositoryException(ErrorCode.CATALOG_STORAGE_FAILURE);
    }
  }

  /**
   * ANCHOR 상품 삭제 (이름)
   */
  @Delete()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: '상품 이름으로 삭제',
    description: '이름이 일치하는(대소문자 무시) 상품을 모두 삭제합니다.',
  })
  @ApiResponse({ status: 200, type: DeleteProductsByNameResponse })
  @ApiResponse({ status: 404, description: '일치하는 상품 없음' })
  async deleteProductsByName(
    @Query() dto: DeleteProductsByNameRequest,
  ): Promise<DeleteProductsByNameResponse> {
    const command = DeleteProductsByNameRequest.toCommand(dto);
    const result = await this.deleteProductsByNameUseCase.execute(command);

    switch (result.status) {
      case 'OK':
        return { data: { deleted: result.deleted } };
      case 'NOT_FOUND':
        throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
      case 'ERROR':
        throw new RepositoryException(ErrorCode.CATALOG_STORAGE_FAILURE);
    }
  }

  /**
   * ANCHOR 상품 삭제 (ID)
   */
  @Delete(':productId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: '상품 삭제' })
  @ApiParam({ name: 'productId', description: '상품 ID' })
  @ApiResponse({ status: 200, description: '삭제 성공' })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async deleteProduct(
    @Param('productId', ParseIntPipe) productId: number,
  ): Promise<void> {
    const command = DeleteProductRequest.toCommand(productId);
    const result = await this.deleteProductUseCase.execute(command);

    switch (result.status) {
      case 'OK':
        return;
      case 'NOT_FOUND':
        throw new DomainException(ErrorCode.PRODUCT_NOT_FOUND);
      case 'ERROR':
        throw new RepositoryException(ErrorCode.CATALOG_STORAGE_FAILURE);
    }
  }
}
