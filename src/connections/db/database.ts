import type { Pool, PoolClient } from 'pg';
import type { Queryable } from './connection';
import {
  type CategoryTreeRepository,
  PgCategoryTreeRepository,
} from '../../modules/categories/category-tree.repository';
import {
  type AttributeRepository,
  PgAttributeRepository,
} from '../../modules/attributes/attribute.repository';
import {
  type CategoryAttributeRepository,
  PgCategoryAttributeRepository,
} from '../../modules/attributes/category-attribute.repository';

/**
 * The repositories a unit of work reads and writes through.
 */
export interface Repositories {
  categories: CategoryTreeRepository;
  attributes: AttributeRepository;
  categoryAttributes: CategoryAttributeRepository;
}

export interface TransactionContext extends Repositories {
  /**
   * Runs `work` so that, if it throws, only its own writes are undone and the
   * surrounding transaction stays usable.
   */
  savepoint<T>(work: () => Promise<T>): Promise<T>;
}

export interface Database extends Repositories {
  transaction<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T>;
}

const createRepositories = (db: Queryable): Repositories => ({
  categories: new PgCategoryTreeRepository(db),
  attributes: new PgAttributeRepository(db),
  categoryAttributes: new PgCategoryAttributeRepository(db),
});

class PgTransactionContext implements TransactionContext {
  readonly categories: CategoryTreeRepository;
  readonly attributes: AttributeRepository;
  readonly categoryAttributes: CategoryAttributeRepository;
  private savepointCounter = 0;

  constructor(private readonly client: PoolClient) {
    const repositories = createRepositories(client);
    this.categories = repositories.categories;
    this.attributes = repositories.attributes;
    this.categoryAttributes = repositories.categoryAttributes;
  }

  async savepoint<T>(work: () => Promise<T>): Promise<T> {
    const name = `sp_${++this.savepointCounter}`;
    await this.client.query(`SAVEPOINT ${name}`);
    try {
      const result = await work();
      await this.client.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      await this.client.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw error;
    }
  }
}

export class PgDatabase implements Database {
  readonly categories: CategoryTreeRepository;
  readonly attributes: AttributeRepository;
  readonly categoryAttributes: CategoryAttributeRepository;

  constructor(private readonly pool: Pool) {
    const repositories = createRepositories(pool);
    this.categories = repositories.categories;
    this.attributes = repositories.attributes;
    this.categoryAttributes = repositories.categoryAttributes;
  }

  async transaction<T>(work: (tx: TransactionContext) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PgTransactionContext(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
