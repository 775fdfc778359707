import { Injectable, OnModuleInit } from '@nestjs/common';
import type { ParamsObject, SqlValue } from 'sql.js';
import {
  SqliteConnection,
  SqliteService,
} from '@common/sqlite-manager/sqlite.service';
import { ErrorCode, RepositoryException } from '@common/exception';
import { IProductRepository } from '../domain/interfaces/product.repository.interface';
import { Product } from '@/product/domain/entities/product.entity';

type QueryParams = Record<string, SqlValue>;

const SELECT_COLUMNS = 'SELECT id, name, price, stock FROM products';

/**
 * `@name` 자리표시자에 맞게 키에 접두사를 붙인다.
 */
const bindNamed = (params: QueryParams): ParamsObject =>
  Object.fromEntries(
    Object.entries(params).map(([key, value]) => [`@${key}`, value]),
  );

/**
 * Product Repository Implementation (SQLite)
 * 동시성 제어: SqliteService가 트랜잭션/조회를 직렬화하므로
 * 트랜잭션 안의 조회-차감 사이에 다른 쓰기가 끼어들 수 없다.
 */
@Injectable()
export class ProductRepository implements IProductRepository, OnModuleInit {
  constructor(private readonly sqlite: SqliteService) {}

  async onModuleInit(): Promise<void> {
    await this.initialize();
  }

  // ANCHOR product.initialize
  async initialize(): Promise<void> {
    await this.sqlite.runInTransaction(() =>
      this.execute((db) =>
        db.run(`
          CREATE TABLE IF NOT EXISTS products (
            id INTEGER PRIMARY KEY,
            name TEXT NOT NULL CHECK (length(trim(name)) > 0),
            price REAL NOT NULL CHECK (price >= 0),
            stock INTEGER NOT NULL CHECK (stock >= 0)
          )
        `),
      ),
    );
  }

  // ANCHOR product.findAll
  async findAll(): Promise<Product[]> {
    const rows = await this.select(`${SELECT_COLUMNS} ORDER BY id`);
    return rows.map((row) => this.mapToDomain(row));
  }

  // ANCHOR product.findLowStock
  async findLowStock(threshold: number): Promise<Product[]> {
    const rows = await this.select(
      `${SELECT_COLUMNS} WHERE stock <= @threshold ORDER BY id`,
      { threshold },
    );
    return rows.map((row) => this.mapToDomain(row));
  }

  // ANCHOR product.findById
  async findById(id: number): Promise<Product | null> {
    const [row] = await this.select(`${SELECT_COLUMNS} WHERE id = @id`, {
      id,
    });
    return row ? this.mapToDomain(row) : null;
  }

  // ANCHOR product.findMaxId
  async findMaxId(): Promise<number | null> {
    const [row] = await this.select('SELECT MAX(id) AS maxId FROM products');
    const maxId = row?.maxId;
    return typeof maxId === 'number' ? maxId : null;
  }

  // ANCHOR product.create
  async create(product: Product): Promise<Product> {
    await this.modify(
      'INSERT INTO products (id, name, price, stock) VALUES (@id, @name, @price, @stock)',
      this.toParams(product),
    );
    return product;
  }

  // ANCHOR product.updateStock
  async updateStock(id: number, stock: number): Promise<void> {
    await this.modify('UPDATE products SET stock = @stock WHERE id = @id', {
      id,
      stock,
    });
  }

  // ANCHOR product.deleteById
  async deleteById(id: number): Promise<number> {
    return this.modify('DELETE FROM products WHERE id = @id', { id });
  }

  // ANCHOR product.deleteByName
  // fold(): SqliteService가 등록한 유니코드 소문자 + trim 함수
  async deleteByName(name: string): Promise<number> {
    return this.modify('DELETE FROM products WHERE fold(name) = fold(@name)', {
      name,
    });
  }

  // ANCHOR product.upsert
  async upsert(product: Product): Promise<void> {
    await this.modify(
      `INSERT INTO products (id, name, price, stock) VALUES (@id, @name, @price, @stock)
       ON CONFLICT(id) DO UPDATE SET
         name = excluded.name,
         price = excluded.price,
         stock = excluded.stock`,
      this.toParams(product),
    );
  }

  private async select(
    sql: string,
    params: QueryParams = {},
  ): Promise<ParamsObject[]> {
    return this.execute((db) => {
      const statement = db.prepare(sql);
      try {
        statement.bind(bindNamed(params));
        const rows: ParamsObject[] = [];
        while (statement.step()) {
          rows.push(statement.getAsObject());
        }
        return rows;
      } finally {
        statement.free();
      }
    });
  }

  /**
   * @returns 변경된 행 수
   */
  private async modify(sql: string, params: QueryParams): Promise<number> {
    return this.execute((db) => {
      db.run(sql, bindNamed(params));
      return db.getRowsModified();
    });
  }

  /**
   * SQLite 드라이버 예외를 RepositoryException으로 감싼다.
   */
  private async execute<T>(work: (db: SqliteConnection) => T): Promise<T> {
    try {
      return await this.sqlite.withConnection(work);
    } catch (error) {
      if (error instanceof RepositoryException) {
        throw error;
      }
      throw new RepositoryException(
        ErrorCode.CATALOG_STORAGE_FAILURE,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private toParams(product: Product): QueryParams {
    return {
      id: product.id,
      name: product.name,
      price: product.price,
      stock: product.stock,
    };
  }

  /**
   * Helper 도메인 맵퍼
   */
  private mapToDomain(row: ParamsObject): Product {
    const { id, name, price, stock } = row;
    if (
      typeof id !== 'number' ||
      typeof name !== 'string' ||
      typeof price !== 'number' ||
      typeof stock !== 'number'
    ) {
      throw new RepositoryException(ErrorCode.CATALOG_STORAGE_FAILURE);
    }
    return new Product(id, name, price, stock);
  }
}
