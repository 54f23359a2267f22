import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const defaultDbPath = path.join(__dirname, '../../data/finance.db');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  DATABASE_PATH: z.string().min(1).default(defaultDbPath),
  SESSION_SECRET: z.string().min(1).default('dev-secret'),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  sessionSecret: string;
  corsOrigin: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return {
    port: parsed.data.PORT,
    databasePath: parsed.data.DATABASE_PATH,
    sessionSecret: parsed.data.SESSION_SECRET,
    corsOrigin: parsed.data.CORS_ORIGIN,
  };
}
