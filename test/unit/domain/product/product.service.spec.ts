import { ProductDomainService } from '@/product/domain/services/product.service';
import { Product } from '@/product/domain/entities/product.entity';
import { IProductRepository } from '@/product/domain/interfaces/product.repository.interface';
import { ErrorCode, DomainException } from '@common/exception';

describe('ProductDomainService', () => {
  let productDomainService: ProductDomainService;
  let mockProductRepository: jest.Mocked<IProductRepository>;

  beforeEach(() => {
    // Mock Repository 생성
    mockProductRepository = {
      initialize: jest.fn(),
      findAll: jest.fn(),
      findLowStock: jest.fn(),
      findById: jest.fn(),
      findMaxId: jest.fn(),
      create: jest.fn(),
      updateStock: jest.fn(),
      deleteById: jest.fn(),
      deleteByName: jest.fn(),
      upsert: jest.fn(),
    };

    productDomainService = new ProductDomainService(mockProductRepository);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('getLowStockProducts', () => {
    it('임계값 이하 상품 조회를 저장소에 위임한다', async () => {
      // given
      const products = [new Product(2, 'Gadget', 24.5, 3)];
      mockProductRepository.findLowStock.mockResolvedValue(products);

      // when
      const result = await productDomainService.getLowStockProducts(5);

      // then
      expect(result).toBe(products);
      expect(mockProductRepository.findLowStock).toHaveBeenCalledWith(5);
    });

    it.each([-1, 2.5])(
      '임계값이 %p이면 INVALID_THRESHOLD 예외를 던지고 저장소에 접근하지 않는다',
      async (threshold) => {
        await expect(
          productDomainService.getLowStockProducts(threshold),
        ).rejects.toMatchObject({ errorCode: ErrorCode.INVALID_THRESHOLD });

        expect(mockProductRepository.findLowStock).not.toHaveBeenCalled();
      },
    );
  });

  describe('getProduct', () => {
    it('존재하지 않는 상품 ID로 조회하면 PRODUCT_NOT_FOUND 예외를 던진다', async () => {
      mockProductRepository.findById.mockResolvedValue(null);

      await expect(productDomainService.getProduct(999)).rejects.toMatchObject({
        errorCode: ErrorCode.PRODUCT_NOT_FOUND,
      });
      expect(mockProductRepository.findById).toHaveBeenCalledWith(999);
    });
  });

  describe('registerProduct', () => {
    it('같은 ID가 없으면 상품을 저장한다', async () => {
      // given
      const product = new Product(1, 'Widget', 9.99, 10);
      mockProductRepository.findById.mockResolvedValue(null);
      mockProductRepository.create.mockResolvedValue(product);

      // when
      const result = await productDomainService.registerProduct(product);

      // then
      expect(result).toBe(product);
      expect(mockProductRepository.create).toHaveBeenCalledWith(product);
    });

    it('같은 ID가 있으면 PRODUCT_ALREADY_EXISTS 예외를 던지고 덮어쓰지 않는다', async () => {
      // given
      mockProductRepository.findById.mockResolvedValue(
        new Product(1, 'Original', 1, 1),
      );

      // when & then
      await expect(
        productDomainService.registerProduct(new Product(1, 'Other', 2, 2)),
      ).rejects.toBeInstanceOf(DomainException);
      expect(mockProductRepository.create).not.toHaveBeenCalled();
    });
  });

  describe('sellProduct', () => {
    it('재고를 차감하고 변경된 재고를 저장한다', async () => {
      // given
      mockProductRepository.findById.mockResolvedValue(
        new Product(1, 'Widget', 9.99, 10),
      );

      // when
      const result = await productDomainService.sellProduct(1, 4);

      // then
      expect(result.stock).toBe(6);
      expect(mockProductRepository.updateStock).toHaveBeenCalledWith(1, 6);
    });

    it('재고가 부족하면 INSUFFICIENT_STOCK 예외를 던지고 저장하지 않는다', async () => {
      mockProductRepository.findById.mockResolvedValue(
        new Product(1, 'Widget', 9.99, 6),
      );

      await expect(
        productDomainService.sellProduct(1, 100),
      ).rejects.toMatchObject({ errorCode: ErrorCode.INSUFFICIENT_STOCK });
      expect(mockProductRepository.updateStock).not.toHaveBeenCalled();
    });

    it('상품이 없으면 PRODUCT_NOT_FOUND 예외를 던진다', async () => {
      mockProductRepository.findById.mockResolvedValue(null);

      await expect(productDomainService.sellProduct(1, 1)).rejects.toMatchObject(
        { errorCode: ErrorCode.PRODUCT_NOT_FOUND },
      );
    });

    it('수량이 0이면 저장소를 조회하지 않고 INVALID_QUANTITY 예외를 던진다', async () => {
      await expect(productDomainService.sellProduct(1, 0)).rejects.toMatchObject(
        { errorCode: ErrorCode.INVALID_QUANTITY },
      );
      expect(mockProductRepository.findById).not.toHaveBeenCalled();
    });
  });

  describe('removeProduct', () => {
    it('삭제된 행이 없으면 PRODUCT_NOT_FOUND 예외를 던진다', async () => {
      mockProductRepository.deleteById.mockResolvedValue(0);

      await expect(productDomainService.removeProduct(99)).rejects.toMatchObject(
        { errorCode: ErrorCode.PRODUCT_NOT_FOUND },
      );
    });

    it('삭제된 행이 있으면 정상 종료한다', async () => {
      mockProductRepository.deleteById.mockResolvedValue(1);

      await expect(productDomainService.removeProduct(1)).resolves.toBeUndefined();
      expect(mockProductRepository.deleteById).toHaveBeenCalledWith(1);
    });
  });

  describe('removeProductsByName', () => {
    it('공백을 제거한 이름으로 일치하는 상품을 모두 삭제하고 삭제 수를 반환한다', async () => {
      mockProductRepository.deleteByName.mockResolvedValue(2);

      const result = await productDomainService.removeProductsByName(' widget ');

      expect(result).toBe(2);
      expect(mockProductRepository.deleteByName).toHaveBeenCalledWith('widget');
    });

    it('빈 이름이면 저장소에 접근하지 않고 PRODUCT_NOT_FOUND 예외를 던진다', async () => {
      await expect(
        productDomainService.removeProductsByName('   '),
      ).rejects.toMatchObject({ errorCode: ErrorCode.PRODUCT_NOT_FOUND });
      expect(mockProductRepository.deleteByName).not.toHaveBeenCalled();
    });

    it('일치하는 상품이 없으면 PRODUCT_NOT_FOUND 예외를 던진다', async () => {
      mockProductRepository.deleteByName.mockResolvedValue(0);

      await expect(
        productDomainService.removeProductsByName('ghost'),
      ).rejects.toMatchObject({ errorCode: ErrorCode.PRODUCT_NOT_FOUND });
    });
  });

  describe('suggestNextId', () => {
    it('상품이 없으면 1을 반환한다', async () => {
      mockProductRepository.findMaxId.mockResolvedValue(null);

      await expect(productDomainService.suggestNextId()).resolves.toBe(1);
    });

    it('최대 ID + 1을 반환한다', async () => {
      mockProductRepository.findMaxId.mockResolvedValue(5);

      await expect(productDomainService.suggestNextId()).resolves.toBe(6);
    });
  });

  describe('upsertProducts', () => {
    it('모든 상품을 upsert하고 개수를 반환한다', async () => {
      const products = [
        new Product(1, 'A', 1, 5),
        new Product(2, 'B', 2, 6),
      ];

      const result = await productDomainService.upsertProducts(products);

      expect(result).toBe(2);
      expect(mockProductRepository.upsert).toHaveBeenCalledTimes(2);
      expect(mockProductRepository.upsert).toHaveBeenNthCalledWith(
        2,
        products[1],
      );
    });
  });
});
