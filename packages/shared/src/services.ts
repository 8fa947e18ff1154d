/**
 * Module Service Interfaces
 *
 * These interfaces define the contract between modules and the API layer.
 * Every method receives the acting Identity explicitly; ownership is checked
 * inside the service, never in the route.
 */

import type {
  Identity,
  PaginatedResult,
  ContractStatus,
  ContractSortField,
  SortOrder,
  VersionSource,
  PartyRole,
  SignatureStatus,
  ActivityAction,
  UserRole,
} from './types';

// ============================================================
// CONTRACT SERVICE
// ============================================================

export interface CreateContractInput {
  title: string;
  templateId: string;
  contractType: string;
  metadata?: Record<string, unknown>;
}

export interface UpdateContractInput {
  title?: string;
  metadata?: Record<string, unknown>;
}

export interface ContractListFilter {
  status?: ContractStatus;
  search?: string;
  templateId?: string;
  fromDate?: string;
  toDate?: string;
}

export interface ContractListQuery extends ContractListFilter {
  page?: number;
  pageSize?: number;
  sortBy?: ContractSortField;
  sortOrder?: SortOrder;
}

export interface ContractDto {
  id: string;
  title: string;
  status: ContractStatus;
  templateId: string;
  contractType: string;
  ownerUserId: string;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
  signedAt: string | null;
}

export interface ContractPartyDto {
  id: string;
  role: PartyRole;
  name: string;
  email: string;
  signatureStatus: SignatureStatus;
  signedAt: string | null;
  order: number;
}

export interface SignatureDto {
  id: string;
  partyId: string;
  partyName: string | null;
  role: PartyRole | null;
  signedAt: string;
  ipAddress: string | null;
  documentHash: string;
}

export interface ContractDetailDto extends ContractDto {
  content: string | null;
  parties: ContractPartyDto[];
  signatures: SignatureDto[];
  documentUrl: string | null;
  documentHash: string | null;
}

export interface ContractVersionDto {
  version: number;
  content: string;
  source: VersionSource;
  createdAt: string;
  createdBy: string;
}

export interface ActivityLogDto {
  id: string;
  action: ActivityAction;
  userId: string;
  userName: string;
  details: Record<string, unknown>;
  timestamp: string;
}

export interface ContractStatsDto {
  total: number;
  byStatus: Partial<Record<ContractStatus, number>>;
  pendingSignatures: number;
  signedThisMonth: number;
}

export interface TransitionsDto {
  currentStatus: ContractStatus;
  allowedTransitions: ContractStatus[];
}

export interface PublicContractViewDto {
  id: string;
  title: string;
  content: string | null;
  party: ContractPartyDto | null;
  documentUrl: string | null;
}

export interface ContentUpdateResultDto {
  contract: ContractDto;
  version: number;
}

/** Latest content of one contract, as bundled into a bulk download. */
export interface ContractContentDto {
  id: string;
  title: string;
  content: string | null;
}

export interface ContractService {
  createContract(identity: Identity, input: CreateContractInput): Promise<ContractDto>;
  listContracts(identity: Identity, query: ContractListQuery): Promise<PaginatedResult<ContractDto>>;
  getContract(identity: Identity, contractId: string): Promise<ContractDetailDto>;
  updateContract(identity: Identity, contractId: string, input: UpdateContractInput): Promise<ContractDto>;
  deleteContract(identity: Identity, contractId: string): Promise<void>;
  duplicateContract(identity: Identity, contractId: string): Promise<ContractDto>;
  updateContent(
    identity: Identity,
    contractId: string,
    content: string,
    source?: VersionSource,
  ): Promise<ContentUpdateResultDto>;
  getVersions(identity: Identity, contractId: string): Promise<ContractVersionDto[]>;
  requestTransition(
    identity: Identity,
    contractId: string,
    status: ContractStatus,
    reason?: string,
  ): Promise<ContractDto>;
  getTransitions(identity: Identity, contractId: string): Promise<TransitionsDto>;
  getHistory(identity: Identity, contractId: string): Promise<ActivityLogDto[]>;
  getStats(identity: Identity): Promise<ContractStatsDto>;
  getRecent(identity: Identity): Promise<ContractDto[]>;
  getPending(identity: Identity): Promise<ContractDto[]>;
  getPublicView(contractId: string, token: string): Promise<PublicContractViewDto>;
  /** Contracts the caller cannot see are left out, not reported. */
  getContents(identity: Identity, contractIds: string[]): Promise<ContractContentDto[]>;
}

// ============================================================
// PARTY COORDINATOR
// ============================================================

export interface AddPartyInput {
  role: PartyRole;
  name: string;
  email: string;
  order?: number;
}

export interface PartyService {
  listParties(identity: Identity, contractId: string): Promise<ContractPartyDto[]>;
  addParty(identity: Identity, contractId: string, input: AddPartyInput): Promise<ContractPartyDto>;
  removeParty(identity: Identity, contractId: string, partyId: string): Promise<void>;
}

// ============================================================
// SIGNATURE SERVICE
// ============================================================

export interface SignatureEvidence {
  ipAddress?: string;
  userAgent?: string;
  geolocation?: string;
}

export interface CreateTokenInput {
  contractId: string;
  partyId: string;
  expiresInMinutes?: number;
}

export interface SignatureTokenDto {
  token: string;
  signUrl: string;
  expiresAt: string;
}

export interface ValidateTokenDto {
  valid: boolean;
  contractId?: string;
  partyId?: string;
  expiresAt?: string;
}

export interface SignInput {
  contractId: string;
  partyId: string;
  evidence?: SignatureEvidence;
}

export interface GuestSignInput {
  token: string;
  evidence?: SignatureEvidence;
}

export interface SignatureResultDto {
  signatureId: string;
  documentHash: string;
  signedAt: string;
  certificateUrl: string;
  contractStatus: ContractStatus;
}

export interface SignatureService {
  createToken(identity: Identity, input: CreateTokenInput): Promise<SignatureTokenDto>;
  validateToken(token: string): Promise<ValidateTokenDto>;
  sign(identity: Identity, input: SignInput): Promise<SignatureResultDto>;
  signAsGuest(input: GuestSignInput): Promise<SignatureResultDto>;
  listSignatures(identity: Identity, contractId: string): Promise<SignatureDto[]>;
  getCertificate(identity: Identity, signatureId: string): Promise<Uint8Array>;
}

// ============================================================
// AUDIT PROJECTION
// ============================================================

export interface AuditEventDto {
  id: string;
  eventType: ActivityAction;
  actor: string;
  actorId: string;
  timestamp: string;
  details: Record<string, unknown>;
}

export interface AuditTrailDto {
  contractId: string;
  events: AuditEventDto[];
  generatedAt: string;
}

export interface AuditService {
  getTrail(identity: Identity, contractId: string): Promise<AuditTrailDto>;
  exportTrail(identity: Identity, contractId: string): Promise<Uint8Array>;
}

// ============================================================
// TEMPLATE CATALOG
// ============================================================

export interface FormFieldOption {
  value: string;
  label: string;
}

export interface FormField {
  name: string;
  label: string;
  type: 'text' | 'email' | 'number' | 'date' | 'select' | 'textarea' | 'checkbox';
  required: boolean;
  placeholder?: string;
  options?: FormFieldOption[];
}

export interface ContractFormSchema {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
  fields: FormField[];
}

export interface ContractTemplateDto {
  id: string;
  name: string;
  description: string;
  category: string;
  jurisdiction: string;
  contractType: string;
  variables: string[];
}

export interface ContractTypeDto {
  id: string;
  name: string;
  description: string;
  category: string;
  icon: string;
}

export interface TemplateFilter {
  category?: string;
  jurisdiction?: string;
}

export type TemplateInputs = Record<string, string | number | boolean | null>;

export interface TemplateService {
  listTemplates(filter?: TemplateFilter): ContractTemplateDto[];
  getTemplate(templateId: string): ContractTemplateDto;
  listTypes(): ContractTypeDto[];
  getTypeSchema(contractType: string): ContractFormSchema;
  /** Renders the type's template body; values are HTML-escaped. */
  render(contractType: string, inputs: TemplateInputs): string;
}

// ============================================================
// USER SERVICE
// ============================================================

export interface UserProfileDto {
  id: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  role: UserRole;
  preferences: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface UpdateProfileInput {
  firstName?: string;
  lastName?: string;
}

export interface UserService {
  /** Returns the caller's account, creating it on first sight. */
  getProfile(identity: Identity): Promise<UserProfileDto>;
  updateProfile(identity: Identity, input: UpdateProfileInput): Promise<UserProfileDto>;
  /** Shallow-merges `preferences` over the stored ones. */
  updatePreferences(identity: Identity, preferences: Record<string, unknown>): Promise<Record<string, unknown>>;
}
