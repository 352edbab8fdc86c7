import { Pool } from 'pg';
import { DatabaseConfigSchema, createLogger, loadConfig } from '@botm/shared';
import { migrate } from '../migrator';

const logger = createLogger({ name: 'migrate' });

async function main(): Promise<void> {
  const config = loadConfig(DatabaseConfigSchema);
  const pool = new Pool({ connectionString: config.DATABASE_URL, max: 1 });
  try {
    const applied = await migrate(pool);
    logger.info({ count: applied.length, applied }, 'All migrations applied');
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Migration failed');
  process.exit(1);
});
