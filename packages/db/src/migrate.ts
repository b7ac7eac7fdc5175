import { Pool } from 'pg';
import { createLogger, loadConfig, BaseConfigSchema, DatabaseConfigSchema } from '@homestock/shared';
import { runMigrations } from './migrator';

const config = loadConfig(BaseConfigSchema.merge(DatabaseConfigSchema));
const logger = createLogger({ name: 'migrate', level: config.LOG_LEVEL });

async function main(): Promise<void> {
  const pool = new Pool({ connectionString: config.DATABASE_URL, max: 1 });
  const client = await pool.connect();
  try {
    await runMigrations({ query: (text, values) => client.query(text, values) }, logger);
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
  process.exit(1);
});
