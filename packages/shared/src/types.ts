// === Contract Types ===

export const CONTRACT_STATUSES = [
  'DRAFT',
  'GENERATED',
  'SIGNING',
  'SIGNED',
  'CANCELLED',
  'EXPIRED',
] as const;

export type ContractStatus = (typeof CONTRACT_STATUSES)[number];

/** Statuses with no outgoing transitions. Content and roster are frozen here. */
export const TERMINAL_STATUSES: readonly ContractStatus[] = ['SIGNED', 'CANCELLED', 'EXPIRED'];

export const VERSION_SOURCES = ['AI', 'USER'] as const;
export type VersionSource = (typeof VERSION_SOURCES)[number];

export const CONTRACT_SORT_FIELDS = ['createdAt', 'updatedAt', 'title', 'status'] as const;
export type ContractSortField = (typeof CONTRACT_SORT_FIELDS)[number];
export type SortOrder = 'asc' | 'desc';

// === Party Types ===

export const PARTY_ROLES = ['HOST', 'GUEST', 'WITNESS'] as const;
export type PartyRole = (typeof PARTY_ROLES)[number];

export const SIGNATURE_STATUSES = ['PENDING', 'INVITED', 'SIGNED'] as const;
export type SignatureStatus = (typeof SIGNATURE_STATUSES)[number];

// === Activity Types ===

export const ACTIVITY_ACTIONS = [
  'CREATED',
  'UPDATED',
  'GENERATED',
  'SIGNED',
  'SENT',
  'CANCELLED',
] as const;

export type ActivityAction = (typeof ACTIVITY_ACTIONS)[number];

// === User Types ===

export const USER_ROLES = ['USER', 'ADMIN'] as const;
export type UserRole = (typeof USER_ROLES)[number];

// === Shared Interfaces ===

/**
 * Authenticated caller as issued by the identity provider.
 * Every write path compares `id` against the contract owner.
 */
export interface Identity {
  id: string;
  email: string;
  name: string | null;
}

export interface Pagination {
  page: number;
  pageSize: number;
  totalPages: number;
  totalItems: number;
}

export interface PaginatedResult<T> {
  data: T[];
  pagination: Pagination;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/** Display name written into the activity trail for an actor. */
export function displayName(identity: Identity): string {
  return identity.name?.trim() || identity.email;
}
