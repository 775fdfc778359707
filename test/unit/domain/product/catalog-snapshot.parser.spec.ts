import { parseCatalogSnapshot } from '@/product/domain/services/catalog-snapshot.parser';
import { ErrorCode } from '@common/exception';

describe('parseCatalogSnapshot', () => {
  it('배열 형식의 레코드를 Product로 변환한다', () => {
    // given
    const source = [
      { id: 1, name: 'Widget', price: 9.99, stock: 10 },
      { id: 2, name: 'Gadget', price: 24.5, stock: 3 },
    ];

    // when
    const result = parseCatalogSnapshot(source);

    // then
    expect(result.skipped).toEqual([]);
    expect(result.products.map((p) => p.toProps())).toEqual([
      { id: 1, name: 'Widget', price: 9.99, stock: 10 },
      { id: 2, name: 'Gadget', price: 24.5, stock: 3 },
    ]);
  });

  it('객체 형식이면 레코드에 id가 없을 때 키를 ID로 사용한다', () => {
    const result = parseCatalogSnapshot({
      '7': { name: 'Bolt', price: '0.25', stock: '2' },
      '8': { id: 12, name: 'Nut', price: 0.1, stock: 50 },
    });

    expect(result.products.map((p) => p.toProps())).toEqual([
      { id: 7, name: 'Bolt', price: 0.25, stock: 2 },
      { id: 12, name: 'Nut', price: 0.1, stock: 50 },
    ]);
  });

  it('가격과 재고가 없으면 0으로 간주한다', () => {
    const result = parseCatalogSnapshot([{ id: 3, name: 'Sample' }]);

    expect(result.products[0].toProps()).toEqual({
      id: 3,
      name: 'Sample',
      price: 0,
      stock: 0,
    });
  });

  it('잘못된 행은 건너뛰고 사유를 기록한다', () => {
    // given
    const source = [
      'not a record',
      { name: 'No id', price: 1, stock: 1 },
      { id: 3, name: '  ', price: 1, stock: 1 },
      { id: 4, name: 'Bad price', price: 'abc', stock: 1 },
      { id: 5, name: 'Bad stock', price: 1, stock: null },
      { id: 6, name: 'Negative', price: -1, stock: 1 },
      { id: 7, name: 'Valid', price: 1, stock: 1 },
    ];

    // when
    const result = parseCatalogSnapshot(source);

    // then
    expect(result.products.map((p) => p.id)).toEqual([7]);
    expect(result.skipped).toEqual([
      { key: '0', reason: 'record is not an object' },
      { key: '1', reason: 'id is not numeric' },
      { key: '2', reason: 'name is missing' },
      { key: '3', reason: 'price is not numeric' },
      { key: '4', reason: 'stock is not numeric' },
      { key: '5', reason: ErrorCode.INVALID_PRICE.message },
    ]);
  });

  it('배열도 객체도 아니면 빈 결과를 반환한다', () => {
    expect(parseCatalogSnapshot('catalog')).toEqual({
      products: [],
      skipped: [],
    });
    expect(parseCatalogSnapshot(null)).toEqual({ products: [], skipped: [] });
  });
});
