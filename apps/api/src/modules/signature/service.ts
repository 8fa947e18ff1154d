/**
 * Signature collection.
 *
 * Both signing paths run one transaction that locks the contract, records an
 * immutable signature over the SHA-256 of the latest content and marks the
 * party SIGNED. The last party to sign moves the contract SIGNING -> SIGNED.
 */

import { createHash, randomBytes } from 'node:crypto';
import {
  createDomainEvent,
  SIGNATURE_TOKEN_BYTES,
  SIGNATURE_TOKEN_DEFAULT_TTL_MINUTES,
  SIGNATURE_TOKEN_MAX_TTL_MINUTES,
} from '@quill/shared';
import type {
  CreateTokenInput,
  DomainEvent,
  EventBus,
  GuestSignInput,
  Identity,
  SignatureDto,
  SignatureEvidence,
  SignatureResultDto,
  SignatureService,
  SignatureTokenDto,
  SignInput,
  ValidateTokenDto,
} from '@quill/shared';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../../middleware/error-handler';
import { config } from '../../shared/config';
import { logger } from '../../shared/logger';
import type { ContractRecord, PartyRecord, SignatureRecord, StoreSession, ContractStore } from '../../store/types';
import { actor, loadOwnedContract, loadTokenTarget } from '../contract/access';
import { formatSignature } from '../contract/mappers';
import { normalizeEmail, PartyCoordinator } from '../contract/parties';
import { renderPdf } from '../document/pdf';

export interface SignatureOptions {
  frontendUrl: string;
  clock: () => Date;
  generateToken: () => string;
}

interface Signer {
  userId: string;
  userName: string;
}

interface SigningOutcome {
  signature: SignatureRecord;
  contractStatus: ContractRecord['status'];
  completed: boolean;
}

const MINUTE_MS = 60 * 1000;

export function hashDocument(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

export function certificateUrl(signatureId: string): string {
  return `/api/v1/signatures/${signatureId}/certificate`;
}

export class SignatureCoordinator implements SignatureService {
  private readonly options: SignatureOptions;

  constructor(
    private readonly store: ContractStore,
    private readonly parties: PartyCoordinator,
    private readonly events: EventBus,
    options: Partial<SignatureOptions> = {},
  ) {
    this.options = {
      frontendUrl: options.frontendUrl ?? config.FRONTEND_URL,
      clock: options.clock ?? (() => new Date()),
      generateToken: options.generateToken ?? (() => randomBytes(SIGNATURE_TOKEN_BYTES).toString('base64url')),
    };
  }

  async createToken(identity: Identity, input: CreateTokenInput): Promise<SignatureTokenDto> {
    const ttl = input.expiresInMinutes ?? SIGNATURE_TOKEN_DEFAULT_TTL_MINUTES;
    if (!Number.isInteger(ttl) || ttl < 1 || ttl > SIGNATURE_TOKEN_MAX_TTL_MINUTES) {
      throw new ValidationError(`expiresInMinutes must be between 1 and ${SIGNATURE_TOKEN_MAX_TTL_MINUTES}`, {
        field: 'expiresInMinutes',
      });
    }

    const issued = await this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, input.contractId, identity, { forUpdate: true });
      if (contract.status !== 'SIGNING') {
        throw new ConflictError('Signature requests need a contract in SIGNING', 'CONFLICT', {
          status: contract.status,
        });
      }
      const party = await this.findParty(session, contract.id, input.partyId);
      if (party.signatureStatus === 'SIGNED') {
        throw new ConflictError('Party has already signed');
      }

      const token = await session.signatures.createToken({
        token: this.options.generateToken(),
        contractId: contract.id,
        partyId: party.id,
        expiresAt: new Date(this.options.clock().getTime() + ttl * MINUTE_MS),
      });
      await this.parties.markInvited(session, party.id);
      await session.activity.append({
        contractId: contract.id,
        action: 'SENT',
        ...actor(identity),
        details: { partyId: party.id, email: party.email },
      });
      return { token, party };
    });

    const signUrl = `${this.options.frontendUrl.replace(/\/+$/, '')}/sign/${input.contractId}?token=${issued.token.token}`;
    logger.info({ contractId: input.contractId, partyId: issued.party.id }, 'Signature requested');
    await this.publish(
      createDomainEvent('SignatureRequested', input.contractId, identity.id, {
        partyId: issued.party.id,
        email: issued.party.email,
        name: issued.party.name,
        signUrl,
      }),
    );

    return { token: issued.token.token, signUrl, expiresAt: issued.token.expiresAt.toISOString() };
  }

  async validateToken(token: string): Promise<ValidateTokenDto> {
    const record = await this.store.transaction(async (session) => {
      const found = await session.signatures.findValidToken(token, this.options.clock());
      return found && (await loadTokenTarget(session, found)) ? found : null;
    });
    if (!record) return { valid: false };
    return {
      valid: true,
      contractId: record.contractId,
      partyId: record.partyId,
      expiresAt: record.expiresAt.toISOString(),
    };
  }

  async sign(identity: Identity, input: SignInput): Promise<SignatureResultDto> {
    const outcome = await this.store.transaction(async (session) => {
      const contract = await session.contracts.findById(input.contractId, { forUpdate: true });
      if (!contract) throw new NotFoundError('Contract', input.contractId);
      const party = await this.findParty(session, contract.id, input.partyId);
      if (party.email !== normalizeEmail(identity.email)) {
        throw new ForbiddenError('You can only sign as yourself');
      }
      return this.recordSignature(session, contract, party, input.evidence, actor(identity));
    });

    return this.finish(outcome, identity.id);
  }

  async signAsGuest(input: GuestSignInput): Promise<SignatureResultDto> {
    const outcome = await this.store.transaction(async (session) => {
      const now = this.options.clock();
      const token = await session.signatures.findValidToken(input.token, now);
      if (!token) throw new ValidationError('Invalid or expired signature token');

      const contract = await session.contracts.findById(token.contractId, { forUpdate: true });
      if (!contract) throw new NotFoundError('Contract', token.contractId);
      const party = await this.findParty(session, contract.id, token.partyId);

      if (!(await session.signatures.markTokenUsed(input.token, now))) {
        throw new ConflictError('Signature token was already used');
      }
      return this.recordSignature(session, contract, party, input.evidence, {
        userId: party.email,
        userName: party.name,
      });
    });

    return this.finish(outcome, null);
  }

  listSignatures(identity: Identity, contractId: string): Promise<SignatureDto[]> {
    return this.store.transaction(async (session) => {
      await loadOwnedContract(session, contractId, identity);
      const signatures = await session.signatures.listByContract(contractId);
      return signatures.map(formatSignature);
    });
  }

  async getCertificate(identity: Identity, signatureId: string): Promise<Uint8Array> {
    const { signature, contract } = await this.store.transaction(async (session) => {
      const found = await session.signatures.findById(signatureId);
      if (!found) throw new NotFoundError('Signature', signatureId);
      const owner = await session.contracts.findById(found.contractId);
      if (!owner) throw new NotFoundError('Contract', found.contractId);

      if (owner.ownerUserId !== identity.id) {
        const party = await session.parties.findById(found.partyId);
        if (!party || party.email !== normalizeEmail(identity.email)) {
          throw new ForbiddenError('You do not have access to this signature');
        }
      }
      return { signature: found, contract: owner };
    });

    return renderPdf({
      title: 'Signature Certificate',
      subtitle: `Issued ${this.options.clock().toISOString()}`,
      lines: [
        `Contract: ${contract.title}`,
        `Contract ID: ${contract.id}`,
        `Signature ID: ${signature.id}`,
        `Signer: ${signature.partyName ?? 'unknown'}`,
        `Role: ${signature.role ?? 'unknown'}`,
        `Signed at: ${signature.signedAt.toISOString()}`,
        `Document hash (SHA-256): ${signature.documentHash}`,
        `IP address: ${signature.ipAddress ?? 'not recorded'}`,
        `User agent: ${signature.userAgent ?? 'not recorded'}`,
        `Geolocation: ${signature.geolocation ?? 'not recorded'}`,
      ],
    });
  }

  private async findParty(session: StoreSession, contractId: string, partyId: string): Promise<PartyRecord> {
    const party = await session.parties.findById(partyId);
    if (!party || party.contractId !== contractId) throw new NotFoundError('Party', partyId);
    return party;
  }

  private async recordSignature(
    session: StoreSession,
    contract: ContractRecord,
    party: PartyRecord,
    evidence: SignatureEvidence | undefined,
    signer: Signer,
  ): Promise<SigningOutcome> {
    if (contract.status !== 'SIGNING') {
      throw new ConflictError('Contract is not open for signing', 'CONFLICT', { status: contract.status });
    }
    if (party.signatureStatus === 'SIGNED') {
      throw new ConflictError('Party has already signed');
    }
    const latest = await session.contracts.latestVersion(contract.id);
    if (!latest) throw new ConflictError('Contract has no content to sign');

    const signedAt = this.options.clock();
    const documentHash = hashDocument(latest.content);
    const signature = await session.signatures.create({
      contractId: contract.id,
      partyId: party.id,
      partyName: party.name,
      role: party.role,
      documentHash,
      ipAddress: evidence?.ipAddress ?? null,
      userAgent: evidence?.userAgent ?? null,
      geolocation: evidence?.geolocation ?? null,
      evidence: { ...evidence, signedBy: signer.userName, contentVersion: latest.version },
      signedAt,
    });
    if (!signature) throw new ConflictError('Party has already signed');

    await this.parties.markSigned(session, party.id, signedAt);
    await session.activity.append({
      contractId: contract.id,
      action: 'SIGNED',
      ...signer,
      details: { partyId: party.id, signatureId: signature.id },
    });

    const roster = await session.parties.list(contract.id);
    if (!roster.every((p) => p.signatureStatus === 'SIGNED')) {
      return { signature, contractStatus: contract.status, completed: false };
    }

    await session.contracts.update(contract.id, { status: 'SIGNED', signedAt });
    await session.activity.append({
      contractId: contract.id,
      action: 'UPDATED',
      ...signer,
      details: { oldStatus: 'SIGNING', newStatus: 'SIGNED', reason: 'All parties signed' },
    });
    return { signature, contractStatus: 'SIGNED', completed: true };
  }

  private async finish(outcome: SigningOutcome, actorId: string | null): Promise<SignatureResultDto> {
    const { signature } = outcome;
    logger.info(
      { contractId: signature.contractId, partyId: signature.partyId, completed: outcome.completed },
      'Party signed',
    );

    await this.publish(
      createDomainEvent('PartySigned', signature.contractId, actorId, {
        partyId: signature.partyId,
        signatureId: signature.id,
      }),
    );
    if (outcome.completed) {
      await this.publish(
        createDomainEvent('ContractStatusChanged', signature.contractId, actorId, {
          oldStatus: 'SIGNING',
          newStatus: 'SIGNED',
          reason: 'All parties signed',
        }),
      );
    }

    return {
      signatureId: signature.id,
      documentHash: signature.documentHash,
      signedAt: signature.signedAt.toISOString(),
      certificateUrl: certificateUrl(signature.id),
      contractStatus: outcome.contractStatus,
    };
  }

  private publish(event: DomainEvent): Promise<void> {
    return this.events.publish(event);
  }
}
