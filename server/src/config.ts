import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  DATABASE_PATH: z.string().min(1).default('data/ledger.db'),
  // Comma-separated; empty allows every origin
  ALLOWED_ORIGINS: z.string().default(''),
  IMPORT_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  allowedOrigins: string[];
  importMaxBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  const { PORT, DATABASE_PATH, ALLOWED_ORIGINS, IMPORT_MAX_BYTES } = parsed.data;
  return {
    port: PORT,
    databasePath: DATABASE_PATH,
    allowedOrigins: ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    importMaxBytes: IMPORT_MAX_BYTES,
  };
}
