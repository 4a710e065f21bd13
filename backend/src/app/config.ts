/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - Builds the identity kind config once, at startup; the core receives it by
 *   reference and never reads env itself.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - Gate settings (HTTP_AUTHENTICATABLE / PARAMS_AUTHENTICATABLE) take
 *   "true", "false", or a comma list of strategy names ("database,token").
 * - Key lists (AUTH_KEYS, RESET_PASSWORD_KEYS, CONFIRMATION_KEYS) are comma
 *   lists of "email" / "username"; each defaults to "email".
 */

import 'dotenv/config';
import { z } from 'zod';

import { AUTHENTICATION_KEYS, IDENTITY_FEATURES, defineIdentityKind } from '../modules/identities';
import type { IdentityKindConfig } from '../modules/identities';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

const StrategyGateSchema = z.string().transform((raw): boolean | string[] => {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false' || normalized === '') return false;
  return splitList(raw);
});

const KeyListSchema = z
  .string()
  .default('email')
  .transform(splitList)
  .pipe(z.array(z.enum(AUTHENTICATION_KEYS)).min(1));

const MINUTE_MS = 60_000;

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('identity-core-backend'),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // Identity kind
  IDENTITY_KIND: z.string().min(1).default('user'),
  AUTH_KEYS: KeyListSchema,
  RESET_PASSWORD_KEYS: KeyListSchema,
  CONFIRMATION_KEYS: KeyListSchema,
  HTTP_AUTHENTICATABLE: StrategyGateSchema.default('false'),
  PARAMS_AUTHENTICATABLE: StrategyGateSchema.default('true'),
  AUTH_FEATURES: z.string().default('').transform(splitList).pipe(z.array(z.enum(IDENTITY_FEATURES))),
  ALLOW_UNCONFIRMED_ACCESS_MINUTES: z.coerce.number().int().min(0).default(0),
  UNLOCK_AFTER_MINUTES: z.coerce.number().int().min(1).optional(),
  TOKEN_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(100_000).default(1000),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  identity: IdentityKindConfig;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    identity: defineIdentityKind({
      name: parsed.IDENTITY_KIND,
      authenticationKeys: parsed.AUTH_KEYS,
      resetPasswordKeys: parsed.RESET_PASSWORD_KEYS,
      confirmationKeys: parsed.CONFIRMATION_KEYS,
      httpAuthenticatable: parsed.HTTP_AUTHENTICATABLE,
      paramsAuthenticatable: parsed.PARAMS_AUTHENTICATABLE,
      features: parsed.AUTH_FEATURES,
      allowUnconfirmedForMs: parsed.ALLOW_UNCONFIRMED_ACCESS_MINUTES * MINUTE_MS,
      unlockAfterMs:
        parsed.UNLOCK_AFTER_MINUTES === undefined ? null : parsed.UNLOCK_AFTER_MINUTES * MINUTE_MS,
      tokenMaxAttempts: parsed.TOKEN_MAX_ATTEMPTS,
    }),
  };
}
