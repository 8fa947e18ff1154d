/**
 * PostgreSQL implementation of the contract store (drizzle-orm over pg).
 *
 * Every repository is bound to one executor: the transaction handle passed by
 * `DrizzleContractStore.transaction`, so all reads and writes of a session
 * share its snapshot and locks.
 */

import { and, asc, count, desc, eq, gt, gte, ilike, inArray, isNull, lt, max, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { VERSION_APPEND_MAX_ATTEMPTS } from '@quill/shared';
import type { ContractStatus } from '@quill/shared';
import * as schema from './schema';
import {
  activityLogs,
  contractParties,
  contractVersions,
  contracts,
  signatureTokens,
  signatures,
  users,
} from './schema';
import { duplicateTitle, escapeLike, PENDING_STATUSES, startOfUtcMonth } from './helpers';
import { claimWithRetry } from './retry';
import type {
  ActivityRepository,
  ContractRepository,
  ContractStore,
  PartyRepository,
  SignatureRepository,
  StoreSession,
  UserRepository,
} from './types';

/** Any drizzle pg driver: node-postgres in the app, PGlite in the store tests. */
type Executor<H extends PgQueryResultHKT> = PgDatabase<H, typeof schema>;

const SORT_COLUMNS = {
  createdAt: contracts.createdAt,
  updatedAt: contracts.updatedAt,
  title: contracts.title,
  status: contracts.status,
};

function firstRow<T>(rows: T[], operation: string): T {
  const [row] = rows;
  if (row === undefined) throw new Error(`${operation} returned no row`);
  return row;
}

function contractRepository<H extends PgQueryResultHKT>(exec: Executor<H>): ContractRepository {
  const liveOwned = (ownerId: string) => and(eq(contracts.ownerUserId, ownerId), isNull(contracts.deletedAt));

  const repo: ContractRepository = {
    async create(input) {
      const rows = await exec
        .insert(contracts)
        .values({
          title: input.title,
          templateId: input.templateId,
          contractType: input.contractType,
          ownerUserId: input.ownerUserId,
          metadata: input.metadata ?? {},
        })
        .returning();
      return firstRow(rows, 'Contract insert');
    },

    async findById(id, options = {}) {
      const where = options.includeDeleted
        ? eq(contracts.id, id)
        : and(eq(contracts.id, id), isNull(contracts.deletedAt));
      const query = exec.select().from(contracts).where(where).limit(1);
      const rows = options.forUpdate ? await query.for('update') : await query;
      return rows[0] ?? null;
    },

    async list(params) {
      const conditions: SQL[] = [eq(contracts.ownerUserId, params.ownerId), isNull(contracts.deletedAt)];
      if (params.status) conditions.push(eq(contracts.status, params.status));
      if (params.templateId) conditions.push(eq(contracts.templateId, params.templateId));
      if (params.createdFrom) conditions.push(gte(contracts.createdAt, params.createdFrom));
      if (params.createdBefore) conditions.push(lt(contracts.createdAt, params.createdBefore));
      if (params.search) {
        const pattern = `%${escapeLike(params.search)}%`;
        const match = or(ilike(contracts.title, pattern), ilike(contracts.contractType, pattern));
        if (match) conditions.push(match);
      }
      const where = and(...conditions);
      const direction = params.sortOrder === 'asc' ? asc : desc;

      const [items, totals] = await Promise.all([
        exec
          .select()
          .from(contracts)
          .where(where)
          .orderBy(direction(SORT_COLUMNS[params.sortBy]), direction(contracts.id))
          .limit(params.pageSize)
          .offset((params.page - 1) * params.pageSize),
        exec.select({ total: count() }).from(contracts).where(where),
      ]);

      return { items, total: totals[0]?.total ?? 0 };
    },

    async update(id, patch) {
      const rows = await exec
        .update(contracts)
        .set({
          title: patch.title,
          metadata: patch.metadata,
          status: patch.status,
          signedAt: patch.signedAt,
          updatedAt: new Date(),
        })
        .where(eq(contracts.id, id))
        .returning();
      return rows[0] ?? null;
    },

    async softDelete(id) {
      const rows = await exec
        .update(contracts)
        .set({ deletedAt: new Date() })
        .where(and(eq(contracts.id, id), isNull(contracts.deletedAt)))
        .returning({ id: contracts.id });
      return rows.length > 0;
    },

    async duplicate(id, ownerId) {
      const source = await repo.findById(id);
      if (!source) return null;

      const copy = await repo.create({
        title: duplicateTitle(source.title),
        templateId: source.templateId,
        contractType: source.contractType,
        ownerUserId: ownerId,
        metadata: { ...source.metadata },
      });

      const latest = await repo.latestVersion(id);
      if (latest) {
        await exec.insert(contractVersions).values({
          contractId: copy.id,
          version: 1,
          content: latest.content,
          source: 'USER',
          createdBy: ownerId,
        });
      }
      return copy;
    },

    async stats(ownerId, now) {
      const grouped = await exec
        .select({ status: contracts.status, total: count() })
        .from(contracts)
        .where(liveOwned(ownerId))
        .groupBy(contracts.status);

      const byStatus: Partial<Record<ContractStatus, number>> = {};
      let total = 0;
      for (const row of grouped) {
        byStatus[row.status] = row.total;
        total += row.total;
      }

      const signed = await exec
        .select({ total: count() })
        .from(contracts)
        .where(
          and(
            liveOwned(ownerId),
            eq(contracts.status, 'SIGNED'),
            gte(contracts.signedAt, startOfUtcMonth(now)),
          ),
        );

      return {
        total,
        byStatus,
        pendingSignatures: byStatus.SIGNING ?? 0,
        signedThisMonth: signed[0]?.total ?? 0,
      };
    },

    recent(ownerId, limit) {
      return exec
        .select()
        .from(contracts)
        .where(liveOwned(ownerId))
        .orderBy(desc(contracts.updatedAt))
        .limit(limit);
    },

    pending(ownerId) {
      return exec
        .select()
        .from(contracts)
        .where(and(liveOwned(ownerId), inArray(contracts.status, [...PENDING_STATUSES])))
        .orderBy(desc(contracts.updatedAt));
    },

    async latestVersion(contractId) {
      const rows = await exec
        .select()
        .from(contractVersions)
        .where(eq(contractVersions.contractId, contractId))
        .orderBy(desc(contractVersions.version))
        .limit(1);
      return rows[0] ?? null;
    },

    listVersions(contractId) {
      return exec
        .select()
        .from(contractVersions)
        .where(eq(contractVersions.contractId, contractId))
        .orderBy(desc(contractVersions.version));
    },

    appendVersion(input) {
      return claimWithRetry(
        async () => {
          const current = await exec
            .select({ value: max(contractVersions.version) })
            .from(contractVersions)
            .where(eq(contractVersions.contractId, input.contractId));
          const next = (current[0]?.value ?? 0) + 1;

          // A concurrent writer holding `next` turns the insert into a no-op
          const rows = await exec
            .insert(contractVersions)
            .values({ ...input, version: next })
            .onConflictDoNothing({ target: [contractVersions.contractId, contractVersions.version] })
            .returning();
          return rows[0] ?? null;
        },
        {
          maxAttempts: VERSION_APPEND_MAX_ATTEMPTS,
          conflictCode: 'VERSION_CONFLICT',
          conflictMessage: 'Could not claim the next version number; retry the request',
        },
      );
    },
  };

  return repo;
}

function partyRepository<H extends PgQueryResultHKT>(exec: Executor<H>): PartyRepository {
  return {
    list(contractId) {
      return exec
        .select()
        .from(contractParties)
        .where(eq(contractParties.contractId, contractId))
        .orderBy(asc(contractParties.signingOrder), asc(contractParties.createdAt));
    },

    async findById(partyId) {
      const rows = await exec.select().from(contractParties).where(eq(contractParties.id, partyId)).limit(1);
      return rows[0] ?? null;
    },

    async add(input) {
      const rows = await exec
        .insert(contractParties)
        .values(input)
        .onConflictDoNothing({ target: [contractParties.contractId, contractParties.email] })
        .returning();
      return rows[0] ?? null;
    },

    async remove(partyId, contractId) {
      const rows = await exec
        .delete(contractParties)
        .where(and(eq(contractParties.id, partyId), eq(contractParties.contractId, contractId)))
        .returning({ id: contractParties.id });
      return rows.length > 0;
    },

    async setStatus(partyId, status, signedAt) {
      const rows = await exec
        .update(contractParties)
        .set({ signatureStatus: status, signedAt })
        .where(eq(contractParties.id, partyId))
        .returning();
      return rows[0] ?? null;
    },
  };
}

function activityRepository<H extends PgQueryResultHKT>(exec: Executor<H>): ActivityRepository {
  return {
    async append(input) {
      const rows = await exec
        .insert(activityLogs)
        .values({ ...input, details: input.details ?? {} })
        .returning();
      return firstRow(rows, 'Activity insert');
    },

    list(contractId) {
      return exec
        .select()
        .from(activityLogs)
        .where(eq(activityLogs.contractId, contractId))
        .orderBy(desc(activityLogs.timestamp), desc(activityLogs.seq));
    },
  };
}

function signatureRepository<H extends PgQueryResultHKT>(exec: Executor<H>): SignatureRepository {
  return {
    async create(input) {
      const rows = await exec
        .insert(signatures)
        .values(input)
        .onConflictDoNothing({ target: signatures.partyId })
        .returning();
      return rows[0] ?? null;
    },

    async findById(signatureId) {
      const rows = await exec.select().from(signatures).where(eq(signatures.id, signatureId)).limit(1);
      return rows[0] ?? null;
    },

    async findByParty(partyId) {
      const rows = await exec.select().from(signatures).where(eq(signatures.partyId, partyId)).limit(1);
      return rows[0] ?? null;
    },

    listByContract(contractId) {
      return exec
        .select()
        .from(signatures)
        .where(eq(signatures.contractId, contractId))
        .orderBy(asc(signatures.signedAt));
    },

    async createToken(input) {
      const rows = await exec.insert(signatureTokens).values(input).returning();
      return firstRow(rows, 'Signature token insert');
    },

    async findValidToken(token, now) {
      const rows = await exec
        .select()
        .from(signatureTokens)
        .where(
          and(
            eq(signatureTokens.token, token),
            eq(signatureTokens.used, false),
            gt(signatureTokens.expiresAt, now),
          ),
        )
        .limit(1);
      return rows[0] ?? null;
    },

    async markTokenUsed(token, now) {
      const rows = await exec
        .update(signatureTokens)
        .set({ used: true, usedAt: now })
        .where(and(eq(signatureTokens.token, token), eq(signatureTokens.used, false)))
        .returning({ id: signatureTokens.id });
      return rows.length > 0;
    },
  };
}

function userRepository<H extends PgQueryResultHKT>(exec: Executor<H>): UserRepository {
  return {
    async findById(id) {
      const rows = await exec.select().from(users).where(eq(users.id, id)).limit(1);
      return rows[0] ?? null;
    },

    async create(input) {
      const rows = await exec.insert(users).values(input).onConflictDoNothing({ target: users.id }).returning();
      return rows[0] ?? null;
    },

    async update(id, patch) {
      const rows = await exec
        .update(users)
        .set({ firstName: patch.firstName, lastName: patch.lastName, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning();
      return rows[0] ?? null;
    },

    async mergePreferences(id, preferences) {
      const rows = await exec
        .update(users)
        .set({
          preferences: sql`${users.preferences} || ${JSON.stringify(preferences)}::jsonb`,
          updatedAt: new Date(),
        })
        .where(eq(users.id, id))
        .returning();
      return rows[0] ?? null;
    },
  };
}

export function createSession<H extends PgQueryResultHKT>(exec: Executor<H>): StoreSession {
  return {
    contracts: contractRepository(exec),
    parties: partyRepository(exec),
    activity: activityRepository(exec),
    signatures: signatureRepository(exec),
    users: userRepository(exec),
  };
}

export class DrizzleContractStore<H extends PgQueryResultHKT = NodePgQueryResultHKT> implements ContractStore {
  constructor(private readonly database: Executor<H>) {}

  transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    return this.database.transaction((tx) => fn(createSession(tx)));
  }
}
