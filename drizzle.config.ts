import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';

const dbUrl = process.env.DATABASE_URL;
if (!dbUrl) {
  throw new Error('DATABASE_URL environment variable is required for drizzle-kit');
}

export default defineConfig({
  schema: './shared/schema.ts',
  out: './migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: dbUrl,
  },
  tablesFilter: [
    'engagement_customers',
    'engagement_sessions',
    'session_registrations',
    'follow_up_actions',
    'executive_outreach',
  ],
  strict: true,
  verbose: true,
});
