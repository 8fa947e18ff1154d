/**
 * Contract store schema.
 *
 * Mirrors drizzle/0000_initial.sql. A contract owns its versions, parties,
 * activity entries, signatures and signature tokens; every child table
 * cascades on contract delete. Normal deletion is the soft `deleted_at`
 * marker, so the cascade only runs on administrative hard deletes.
 */

import { sql } from 'drizzle-orm';
import {
  bigserial,
  boolean,
  check,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  unique,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';
import type {
  ActivityAction,
  ContractStatus,
  PartyRole,
  SignatureStatus,
  UserRole,
  VersionSource,
} from '@quill/shared';

/** Accounts provisioned from the identity provider on first sight. */
export const users = pgTable(
  'users',
  {
    id: varchar('id', { length: 255 }).primaryKey(),
    email: varchar('email', { length: 255 }).notNull(),
    firstName: varchar('first_name', { length: 100 }),
    lastName: varchar('last_name', { length: 100 }),
    role: varchar('role', { length: 20 }).$type<UserRole>().notNull().default('USER'),
    preferences: jsonb('preferences').$type<Record<string, unknown>>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    emailIdx: index('users_email_idx').on(table.email),
    roleValid: check('users_role_valid', sql`${table.role} IN ('USER', 'ADMIN')`),
  }),
);

export const contracts = pgTable(
  'contracts',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    title: varchar('title', { length: 500 }).notNull(),
    contractType: varchar('contract_type', { length: 100 }).notNull(),
    templateId: varchar('template_id', { length: 100 }).notNull(),
    ownerUserId: varchar('owner_user_id', { length: 255 }).notNull(),
    status: varchar('status', { length: 20 }).$type<ContractStatus>().notNull().default('DRAFT'),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    signedAt: timestamp('signed_at', { withTimezone: true }),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => ({
    ownerIdx: index('contracts_owner_idx').on(table.ownerUserId),
    titleLength: check('contracts_title_min_length', sql`char_length(${table.title}) >= 3`),
    statusValid: check(
      'contracts_status_valid',
      sql`${table.status} IN ('DRAFT', 'GENERATED', 'SIGNING', 'SIGNED', 'CANCELLED', 'EXPIRED')`,
    ),
  }),
);

export const contractVersions = pgTable(
  'contract_versions',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    contractId: uuid('contract_id')
      .notNull()
      .references(() => contracts.id, { onDelete: 'cascade' }),
    version: integer('version').notNull(),
    content: text('content').notNull(),
    source: varchar('source', { length: 10 }).$type<VersionSource>().notNull(),
    createdBy: varchar('created_by', { length: 255 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    versionUnique: unique('version_unique_per_contract').on(table.contractId, table.version),
    versionPositive: check('version_number_positive', sql`${table.version} > 0`),
    sourceValid: check('version_source_valid', sql`${table.source} IN ('AI', 'USER')`),
  }),
);

export const contractParties = pgTable(
  'contract_parties',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    contractId: uuid('contract_id')
      .notNull()
      .references(() => contracts.id, { onDelete: 'cascade' }),
    role: varchar('role', { length: 10 }).$type<PartyRole>().notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    email: varchar('email', { length: 255 }).notNull(),
    signatureStatus: varchar('signature_status', { length: 10 })
      .$type<SignatureStatus>()
      .notNull()
      .default('PENDING'),
    signedAt: timestamp('signed_at', { withTimezone: true }),
    signingOrder: integer('signing_order').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    emailUnique: unique('party_email_unique_per_contract').on(table.contractId, table.email),
    roleValid: check('party_role_valid', sql`${table.role} IN ('HOST', 'GUEST', 'WITNESS')`),
    statusValid: check(
      'party_signature_status_valid',
      sql`${table.signatureStatus} IN ('PENDING', 'INVITED', 'SIGNED')`,
    ),
    orderPositive: check('party_signing_order_positive', sql`${table.signingOrder} > 0`),
  }),
);

export const activityLogs = pgTable(
  'activity_logs',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    // Insertion order; entries of one transaction share their timestamp
    seq: bigserial('seq', { mode: 'number' }).notNull(),
    contractId: uuid('contract_id')
      .notNull()
      .references(() => contracts.id, { onDelete: 'cascade' }),
    action: varchar('action', { length: 20 }).$type<ActivityAction>().notNull(),
    userId: varchar('user_id', { length: 255 }).notNull(),
    userName: varchar('user_name', { length: 255 }).notNull(),
    details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    contractIdx: index('activity_logs_contract_idx').on(table.contractId, table.timestamp, table.seq),
    actionValid: check(
      'activity_action_valid',
      sql`${table.action} IN ('CREATED', 'UPDATED', 'GENERATED', 'SIGNED', 'SENT', 'CANCELLED')`,
    ),
  }),
);

export const signatures = pgTable(
  'signatures',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    contractId: uuid('contract_id')
      .notNull()
      .references(() => contracts.id, { onDelete: 'cascade' }),
    partyId: uuid('party_id')
      .notNull()
      .references(() => contractParties.id),
    partyName: varchar('party_name', { length: 255 }),
    role: varchar('role', { length: 10 }).$type<PartyRole>(),
    documentHash: varchar('document_hash', { length: 64 }).notNull(),
    ipAddress: varchar('ip_address', { length: 45 }),
    userAgent: text('user_agent'),
    geolocation: varchar('geolocation', { length: 255 }),
    evidence: jsonb('evidence').$type<Record<string, unknown>>().notNull().default({}),
    signedAt: timestamp('signed_at', { withTimezone: true }).notNull().defaultNow(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    contractIdx: index('signatures_contract_idx').on(table.contractId),
    partyUnique: unique('signature_unique_per_party').on(table.partyId),
  }),
);

export const signatureTokens = pgTable(
  'signature_tokens',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    token: varchar('token', { length: 255 }).notNull().unique(),
    contractId: uuid('contract_id')
      .notNull()
      .references(() => contracts.id, { onDelete: 'cascade' }),
    partyId: uuid('party_id')
      .notNull()
      .references(() => contractParties.id, { onDelete: 'cascade' }),
    used: boolean('used').notNull().default(false),
    usedAt: timestamp('used_at', { withTimezone: true }),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
);
