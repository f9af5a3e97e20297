import { DatabaseManager } from './DatabaseManager.js';
import { MigrationRunner } from './MigrationRunner.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { initializeLogger, logger } from '../middleware/logging.js';
import { getErrorMessage } from '../utils/errorHandling.js';

/**
 * Standalone migration command: `npm run migrate` / `npm run migrate -- rollback [version]`
 */
async function runMigrations(): Promise<void> {
  const config = ConfigManager.getInstance().getConfig();
  initializeLogger(config.logging);

  logger.info('Starting database migration', { filename: config.database.filename });

  const dbManager = new DatabaseManager(config.database);

  try {
    await dbManager.connect();
    const migrationRunner = new MigrationRunner(dbManager.getConnection());

    const [command, target] = process.argv.slice(2);
    if (command === 'rollback') {
      await migrationRunner.rollback(target);
    } else {
      await migrationRunner.migrate();
    }

    const status = await migrationRunner.status();
    for (const migration of status) {
      logger.info(`${migration.executed ? 'applied' : 'pending'} ${migration.version} - ${migration.name}`);
    }
  } finally {
    await dbManager.disconnect();
  }
}

runMigrations().catch(error => {
  logger.error('Migration failed', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
