export { pool, connectDatabase } from './connection';
export type { Queryable } from './connection';
export { migrate } from './migrate';
export { PgDatabase } from './database';
export type { Database, Repositories, TransactionContext } from './database';
