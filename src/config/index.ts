import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  // 7 days
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60 * 24 * 7),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  INFERENCE_SERVICE_URL: z.string().url().default('http://localhost:8001'),
  INFERENCE_API_KEY: z.string().default(''),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  INFERENCE_STREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  CORS_ORIGINS: z.string().default('*'),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  database: {
    url: string;
    poolSize: number;
  };
  auth: {
    jwtSecret: string;
    tokenTtlMinutes: number;
    bcryptRounds: number;
  };
  inference: {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
    streamTimeoutMs: number;
  };
  corsOrigins: string[] | '*';
}

/**
 * Parse and validate the process environment. Throws a ZodError listing
 * every invalid variable so a misconfigured deployment fails at startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  const origins = parsed.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    database: {
      url: parsed.DATABASE_URL,
      poolSize: parsed.DATABASE_POOL_SIZE,
    },
    auth: {
      jwtSecret: parsed.JWT_SECRET,
      tokenTtlMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
      bcryptRounds: parsed.BCRYPT_ROUNDS,
    },
    inference: {
      baseUrl: parsed.INFERENCE_SERVICE_URL.replace(/\/+$/, ''),
      apiKey: parsed.INFERENCE_API_KEY.trim(),
      timeoutMs: parsed.INFERENCE_TIMEOUT_MS,
      streamTimeoutMs: parsed.INFERENCE_STREAM_TIMEOUT_MS,
    },
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
  };
}
