import dotenv from 'dotenv';
import { defineConfig } from 'drizzle-kit';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

// `db:generate` writes SQL plus the meta journal that src/migrate.ts replays
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/schema/index.ts',
  out: './migrations',
  dbCredentials: {
    url: process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL || '',
  },
  strict: true,
});
