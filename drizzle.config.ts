import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/infrastructure/db/schema.ts',
  out: './drizzle',
  dialect: 'sqlite',
  dbCredentials: {
    url: `file:${process.env['ACTIVITY_RELAY_DB_PATH'] ?? './activity.db'}`,
  },
});
