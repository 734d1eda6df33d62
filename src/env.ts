import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(10485760), // 10 MB
  REDACTED_HEADERS: z.string().optional().default(''),
  EXPOSE_INTERNAL_ROUTES: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalid = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new Error(`Environment validation failed: ${invalid}`);
    }
    throw error;
  }
}

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}

export function parseRedactedHeaders(value: string): string[] {
  return value.split(',').map((f) => f.trim().toLowerCase()).filter(Boolean);
}
