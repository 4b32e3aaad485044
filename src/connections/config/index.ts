export { appConfig, logConfig, cascadeConfig } from './app.config';
export { dbConfig } from './database.config';
