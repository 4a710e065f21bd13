import { randomUUID } from 'node:crypto';
import { FieldErrors } from '../../src/modules/identities/field-errors';
import type {
  IdentityStore,
  IdentityTokenWriter,
} from '../../src/modules/identities/dal/identity.store';
import type {
  AuthConditions,
  IdentityField,
  IdentitySubject,
  TokenField,
} from '../../src/modules/identities/identity.types';
import { conditionEntries } from '../../src/modules/identities/helpers/sanitize-auth-conditions';

type StoredIdentity = {
  id: string;
  attributes: AuthConditions;
  passwordHash: string | null;
  confirmedAt: Date | null;
  lockedAt: Date | null;
  createdAt: Date;
  tokenSentAt: Partial<Record<TokenField, Date>>;
};

export type SeedIdentity = {
  email: string;
  username?: string;
  passwordHash?: string | null;
  confirmedAt?: Date | null;
  lockedAt?: Date | null;
  createdAt?: Date;
  resetPasswordToken?: string;
  confirmationToken?: string;
};

/**
 * WHY:
 * - In-process stand-in for IdentityRepo so unit and E2E tests never touch Postgres.
 * - Strongly consistent by construction (single Map, single thread).
 */
export class InMemIdentityStore implements IdentityStore, IdentityTokenWriter {
  private readonly rows = new Map<string, StoredIdentity>();

  insert(seed: SeedIdentity): string {
    const id = randomUUID();
    const attributes: AuthConditions = { email: seed.email };
    if (seed.username !== undefined) attributes.username = seed.username;
    if (seed.resetPasswordToken !== undefined) attributes.resetPasswordToken = seed.resetPasswordToken;
    if (seed.confirmationToken !== undefined) attributes.confirmationToken = seed.confirmationToken;

    this.rows.set(id, {
      id,
      attributes,
      passwordHash: seed.passwordHash ?? null,
      confirmedAt: seed.confirmedAt ?? null,
      lockedAt: seed.lockedAt ?? null,
      createdAt: seed.createdAt ?? new Date('2026-01-01T00:00:00.000Z'),
      tokenSentAt: {},
    });
    return id;
  }

  get(id: string): StoredIdentity | undefined {
    return this.rows.get(id);
  }

  findFirst(conditions: AuthConditions): Promise<IdentitySubject | undefined> {
    const entries = conditionEntries(conditions);
    for (const row of this.rows.values()) {
      if (entries.every(([field, value]) => row.attributes[field] === value)) {
        return Promise.resolve(this.toSubject(row));
      }
    }
    return Promise.resolve(undefined);
  }

  existsBy(field: IdentityField, value: string): Promise<boolean> {
    for (const row of this.rows.values()) {
      if (row.attributes[field] === value) return Promise.resolve(true);
    }
    return Promise.resolve(false);
  }

  assignToken(params: {
    identityId: string;
    field: TokenField;
    token: string;
    sentAt: Date;
  }): Promise<void> {
    const row = this.rows.get(params.identityId);
    if (row) {
      row.attributes[params.field] = params.token;
      row.tokenSentAt[params.field] = params.sentAt;
    }
    return Promise.resolve();
  }

  private toSubject(row: StoredIdentity): IdentitySubject {
    return {
      id: row.id,
      attributes: { ...row.attributes },
      passwordHash: row.passwordHash,
      confirmedAt: row.confirmedAt,
      lockedAt: row.lockedAt,
      createdAt: row.createdAt,
      errors: new FieldErrors(),
    };
  }
}
