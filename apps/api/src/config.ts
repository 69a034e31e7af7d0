import { z } from 'zod';

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => {
    if (typeof v === 'string' && v.trim().length === 0) return undefined;
    return v;
  }, schema);

const ConfigSchema = z.object({
  PORT: emptyToUndefined(z.coerce.number().int().positive().default(3000)),
  CARDWISE_DB_PATH: emptyToUndefined(z.string().default(':memory:')),
  CARDWISE_CORS_ORIGINS: emptyToUndefined(z.string().default('http://localhost:5173,http://localhost:3000')),
  CARDWISE_MIN_DUE_RATE: emptyToUndefined(z.coerce.number().min(0).max(1).default(0.03)),
  CARDWISE_SEED_DEMO: emptyToUndefined(z.enum(['true', 'false']).default('false')),
});

export interface AppConfig {
  port: number;
  dbPath: string;
  corsOrigins: string[];
  minimumDueRate: number;
  seedDemo: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment variables: ${message}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    dbPath: data.CARDWISE_DB_PATH,
    corsOrigins: data.CARDWISE_CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    minimumDueRate: data.CARDWISE_MIN_DUE_RATE,
    seedDemo: data.CARDWISE_SEED_DEMO === 'true',
  };
}
