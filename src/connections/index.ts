// Database
export { pool, migrate, connectDatabase, PgDatabase } from './db';
export type { Database, Repositories, TransactionContext } from './db';

// Config - All configurations in one place
export { appConfig, logConfig, cascadeConfig, dbConfig } from './config';
