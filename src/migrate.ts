import { join } from 'node:path';
import { Logger } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';

const logger = new Logger('Migrate');
const connectionString = process.env.DATABASE_URL;

if (!connectionString) {
  logger.error('DATABASE_URL environment variable is required');
  process.exit(1);
}

// dist/migrate.js and src/migrate.ts both sit one level below the project root
const migrationsFolder = join(__dirname, '..', 'drizzle');

const client = postgres(connectionString, { max: 1 });
const db = drizzle(client);

migrate(db, { migrationsFolder })
  .then(() => {
    logger.log(`Migrations from ${migrationsFolder} applied`);
    return client.end();
  })
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    logger.error('Migration failed', err);
    process.exit(1);
  });
