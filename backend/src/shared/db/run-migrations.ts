import { getDataSource } from './data-source.js';
import { logger } from '@shared/utils/logger.js';

/**
 * Run pending database migrations
 */
export async function runMigrations(): Promise<void> {
  logger.info('🔄 Running database migrations...');

  try {
    const dataSource = await getDataSource();
    const pending = await dataSource.showMigrations();
    if (pending) {
      const applied = await dataSource.runMigrations({ transaction: 'all' });
      applied.forEach((migration) => logger.info(`  ✅ ${migration.name}`));
    }
    logger.info('✅ Database migrations complete');
  } catch (error) {
    logger.error('❌ Migration failed:', error instanceof Error ? error.message : error);
    throw error;
  }
}

/**
 * Initialize database schema before starting the server
 */
export async function initializeDatabase(): Promise<void> {
  await runMigrations();
}
