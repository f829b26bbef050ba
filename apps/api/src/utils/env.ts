// src/utils/env.ts
// Ensure .env is loaded when this module is imported (dev/local)
import 'dotenv/config';
import { z } from 'zod';
import type { PhoneConvention } from '@intake-desk/shared';
import { DEFAULT_PHONE_CONVENTION, DEFAULT_RESOLVE_MAX_ATTEMPTS } from '@intake-desk/shared';

const numeric = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, 'Expected a non-negative integer')
    .transform(Number)
    .optional()
    .transform((v) => v ?? fallback);

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: numeric(8080),
    CORS_ORIGIN: z.string().optional(),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    SERVICE_NAME: z.string().min(1).default('intake-api'),

    // Store selection; the memory store keeps nothing across restarts
    INTAKE_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().min(1).optional(),
    DB_POOL_MAX: numeric(10),
    DB_CONNECTION_TIMEOUT_MS: numeric(10_000),
    DB_STATEMENT_TIMEOUT_MS: numeric(15_000),

    RESOLVE_MAX_ATTEMPTS: numeric(DEFAULT_RESOLVE_MAX_ATTEMPTS).pipe(z.number().int().min(1).max(10)),

    PHONE_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default(DEFAULT_PHONE_CONVENTION.countryCode),
    PHONE_NATIONAL_LENGTH: numeric(DEFAULT_PHONE_CONVENTION.nationalNumberLength).pipe(
      z.number().int().min(4).max(14)
    ),
    PHONE_TRUNK_PREFIX: z.string().regex(/^\d*$/).default(DEFAULT_PHONE_CONVENTION.trunkPrefix),
  })
  .superRefine((value, ctx) => {
    if (value.INTAKE_STORE === 'postgres' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when INTAKE_STORE=postgres',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }
  return parsed.data;
}

export function phoneConventionOf(env: Env): PhoneConvention {
  return {
    countryCode: env.PHONE_COUNTRY_CODE,
    nationalNumberLength: env.PHONE_NATIONAL_LENGTH,
    trunkPrefix: env.PHONE_TRUNK_PREFIX,
  };
}
