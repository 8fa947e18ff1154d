/**
 * Contract store port.
 *
 * Services only see these interfaces. `DrizzleContractStore` implements them
 * over PostgreSQL; tests use an in-process fake with the same locking and
 * constraint behavior.
 */

import type {
  ActivityAction,
  ContractSortField,
  ContractStatus,
  PartyRole,
  SignatureStatus,
  SortOrder,
  VersionSource,
} from '@quill/shared';
import type {
  activityLogs,
  contractParties,
  contractVersions,
  contracts,
  signatureTokens,
  signatures,
  users,
} from './schema';

export type ContractRecord = typeof contracts.$inferSelect;
export type VersionRecord = typeof contractVersions.$inferSelect;
export type PartyRecord = typeof contractParties.$inferSelect;
export type ActivityRecord = typeof activityLogs.$inferSelect;
export type SignatureRecord = typeof signatures.$inferSelect;
export type SignatureTokenRecord = typeof signatureTokens.$inferSelect;
export type UserRecord = typeof users.$inferSelect;

// === Inputs ===

export interface NewContract {
  title: string;
  templateId: string;
  contractType: string;
  ownerUserId: string;
  metadata?: Record<string, unknown>;
}

/** Only defined fields are written. */
export interface ContractPatch {
  title?: string;
  metadata?: Record<string, unknown>;
  status?: ContractStatus;
  signedAt?: Date;
}

export interface FindContractOptions {
  includeDeleted?: boolean;
  /** Row lock held until the surrounding transaction ends. */
  forUpdate?: boolean;
}

export interface ContractListParams {
  ownerId: string;
  status?: ContractStatus;
  search?: string;
  templateId?: string;
  createdFrom?: Date;
  createdBefore?: Date;
  page: number;
  pageSize: number;
  sortBy: ContractSortField;
  sortOrder: SortOrder;
}

export interface ContractPage {
  items: ContractRecord[];
  total: number;
}

export interface ContractStats {
  total: number;
  byStatus: Partial<Record<ContractStatus, number>>;
  pendingSignatures: number;
  signedThisMonth: number;
}

export interface NewVersion {
  contractId: string;
  content: string;
  source: VersionSource;
  createdBy: string;
}

export interface NewParty {
  contractId: string;
  role: PartyRole;
  name: string;
  email: string;
  signingOrder: number;
}

export interface NewActivity {
  contractId: string;
  action: ActivityAction;
  userId: string;
  userName: string;
  details?: Record<string, unknown>;
}

export interface NewSignature {
  contractId: string;
  partyId: string;
  partyName: string;
  role: PartyRole;
  documentHash: string;
  ipAddress: string | null;
  userAgent: string | null;
  geolocation: string | null;
  evidence: Record<string, unknown>;
  signedAt: Date;
}

export interface NewSignatureToken {
  token: string;
  contractId: string;
  partyId: string;
  expiresAt: Date;
}

export interface NewUser {
  id: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
}

/** Only defined fields are written. */
export interface UserPatch {
  firstName?: string;
  lastName?: string;
}

// === Repositories ===

export interface ContractRepository {
  create(input: NewContract): Promise<ContractRecord>;
  findById(id: string, options?: FindContractOptions): Promise<ContractRecord | null>;
  list(params: ContractListParams): Promise<ContractPage>;
  update(id: string, patch: ContractPatch): Promise<ContractRecord | null>;
  /** True the first time; false when already deleted or absent. */
  softDelete(id: string): Promise<boolean>;
  /** New DRAFT owned by `ownerId` carrying the source's latest content as version 1. */
  duplicate(id: string, ownerId: string): Promise<ContractRecord | null>;
  stats(ownerId: string, now: Date): Promise<ContractStats>;
  recent(ownerId: string, limit: number): Promise<ContractRecord[]>;
  pending(ownerId: string): Promise<ContractRecord[]>;
  latestVersion(contractId: string): Promise<VersionRecord | null>;
  /** Newest first. */
  listVersions(contractId: string): Promise<VersionRecord[]>;
  /** Claims the next version number; throws ConflictError(VERSION_CONFLICT) when retries run out. */
  appendVersion(input: NewVersion): Promise<VersionRecord>;
}

export interface PartyRepository {
  list(contractId: string): Promise<PartyRecord[]>;
  findById(partyId: string): Promise<PartyRecord | null>;
  /** Null when the contract already has a party with this email. */
  add(input: NewParty): Promise<PartyRecord | null>;
  remove(partyId: string, contractId: string): Promise<boolean>;
  setStatus(partyId: string, status: SignatureStatus, signedAt?: Date): Promise<PartyRecord | null>;
}

export interface ActivityRepository {
  append(input: NewActivity): Promise<ActivityRecord>;
  /** Newest first. */
  list(contractId: string): Promise<ActivityRecord[]>;
}

export interface SignatureRepository {
  /** Null when the party already has a signature. */
  create(input: NewSignature): Promise<SignatureRecord | null>;
  findById(signatureId: string): Promise<SignatureRecord | null>;
  findByParty(partyId: string): Promise<SignatureRecord | null>;
  listByContract(contractId: string): Promise<SignatureRecord[]>;
  createToken(input: NewSignatureToken): Promise<SignatureTokenRecord>;
  /** Unused and not expired at `now`. */
  findValidToken(token: string, now: Date): Promise<SignatureTokenRecord | null>;
  /** Compare-and-swap on `used = false`; false when another request consumed it first. */
  markTokenUsed(token: string, now: Date): Promise<boolean>;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  /** Null when the id is already taken. */
  create(input: NewUser): Promise<UserRecord | null>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  /** Top-level keys of `preferences` replace the stored ones; the rest are kept. */
  mergePreferences(id: string, preferences: Record<string, unknown>): Promise<UserRecord | null>;
}

export interface StoreSession {
  contracts: ContractRepository;
  parties: PartyRepository;
  activity: ActivityRepository;
  signatures: SignatureRepository;
  users: UserRepository;
}

export interface ContractStore {
  /**
   * Runs `fn` in one database transaction. Everything written through the
   * session commits together or not at all; row locks are released at the end.
   */
  transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
}
