import { PgDatabase, pool } from '../connections';
import { CategoryAttributeService } from '../modules/attributes/category-attributes.service';
import { errorMessage, logger } from '../utils/logging';

/**
 * Re-materializes missing inherited bindings for every category.
 * Usage: npm run rebuild-inheritance
 */
const run = async () => {
  try {
    const service = new CategoryAttributeService(new PgDatabase(pool));
    const result = await service.rebuildAllCategoryInheritance();

    logger.info(
      `Rebuild finished: ${result.inserted} bindings inserted across ${result.categories} categories`
    );
    if (result.failed.length > 0) {
      logger.warn('Some categories could not be rebuilt', { failed: result.failed });
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Rebuild error', { error: errorMessage(error) });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
};

void run();
