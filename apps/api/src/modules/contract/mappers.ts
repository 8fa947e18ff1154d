import type {
  ActivityLogDto,
  ContractDto,
  ContractPartyDto,
  ContractVersionDto,
  SignatureDto,
} from '@quill/shared';
import type {
  ActivityRecord,
  ContractRecord,
  PartyRecord,
  SignatureRecord,
  VersionRecord,
} from '../../store/types';

export function formatContract(c: ContractRecord): ContractDto {
  return {
    id: c.id,
    title: c.title,
    status: c.status,
    templateId: c.templateId,
    contractType: c.contractType,
    ownerUserId: c.ownerUserId,
    metadata: c.metadata,
    createdAt: c.createdAt.toISOString(),
    updatedAt: c.updatedAt.toISOString(),
    signedAt: c.signedAt?.toISOString() ?? null,
  };
}

export function formatParty(p: PartyRecord): ContractPartyDto {
  return {
    id: p.id,
    role: p.role,
    name: p.name,
    email: p.email,
    signatureStatus: p.signatureStatus,
    signedAt: p.signedAt?.toISOString() ?? null,
    order: p.signingOrder,
  };
}

export function formatSignature(s: SignatureRecord): SignatureDto {
  return {
    id: s.id,
    partyId: s.partyId,
    partyName: s.partyName,
    role: s.role,
    signedAt: s.signedAt.toISOString(),
    ipAddress: s.ipAddress,
    documentHash: s.documentHash,
  };
}

export function formatVersion(v: VersionRecord): ContractVersionDto {
  return {
    version: v.version,
    content: v.content,
    source: v.source,
    createdAt: v.createdAt.toISOString(),
    createdBy: v.createdBy,
  };
}

export function formatActivity(a: ActivityRecord): ActivityLogDto {
  return {
    id: a.id,
    action: a.action,
    userId: a.userId,
    userName: a.userName,
    details: a.details,
    timestamp: a.timestamp.toISOString(),
  };
}

/** Reads a string entry from contract metadata, e.g. `documentUrl`. */
export function metadataString(metadata: Record<string, unknown>, key: string): string | null {
  const value = metadata[key];
  return typeof value === 'string' ? value : null;
}
