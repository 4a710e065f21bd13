/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db) and shares them safely.
 * - Tests swap the identity store, queue, hasher and clock through overrides
 *   instead of reaching into modules.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import type { RandomTokenSource } from '../shared/security/token';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import { createIdentityModule, IdentityRepo } from '../modules/identities';
import type { IdentityModule, IdentityStore, IdentityTokenWriter } from '../modules/identities';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  db: Db;
  logger: Logger;

  passwordHasher: PasswordHasher;
  queue: Queue;

  // modules
  identities: IdentityModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = Partial<{
  identityStore: IdentityStore & IdentityTokenWriter;
  passwordHasher: PasswordHasher;
  queue: Queue;
  random: RandomTokenSource;
  now: () => Date;
}>;

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  // pg connects lazily: nothing is opened until the first query.
  const db = createDb(config.databaseUrl);

  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Phase 1: in-memory queue (swap for a real mail transport adapter here)
  const queue: Queue = overrides.queue ?? new InMemQueue();

  const identities = createIdentityModule({
    kind: config.identity,
    store: overrides.identityStore ?? new IdentityRepo(db),
    logger,
    random: overrides.random,
    now: overrides.now,
  });

  const auth = createAuthModule({
    identities,
    passwordHasher,
    queue,
    logger,
    now: overrides.now,
  });

  return {
    db,
    logger,
    passwordHasher,
    queue,
    identities,
    auth,
    close: async () => {
      await db.destroy();
    },
  };
}
