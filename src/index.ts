import { createApp } from './app';
import { appConfig } from './connections/config/app.config';
import { PgDatabase, connectDatabase, pool } from './connections';
import { CategoryAttributeService } from './modules/attributes/category-attributes.service';
import { errorMessage, logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    const service = new CategoryAttributeService(new PgDatabase(pool));
    const app = createApp(service);

    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

void startServer();
