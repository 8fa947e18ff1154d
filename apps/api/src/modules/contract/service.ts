/**
 * Contract lifecycle service.
 *
 * Every mutation runs in one store transaction: lock the contract row, check
 * ownership and status, write the change and its activity entry. Domain
 * events go out only after the transaction has committed.
 */

import { isDeepStrictEqual } from 'node:util';
import {
  createDomainEvent,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MIN_TITLE_LENGTH,
  RECENT_CONTRACTS_LIMIT,
} from '@quill/shared';
import type {
  ActivityLogDto,
  ContentUpdateResultDto,
  ContractContentDto,
  ContractDetailDto,
  ContractDto,
  ContractListQuery,
  ContractService,
  ContractStatsDto,
  ContractStatus,
  ContractVersionDto,
  CreateContractInput,
  DomainEvent,
  EventBus,
  Identity,
  PaginatedResult,
  PublicContractViewDto,
  TransitionsDto,
  UpdateContractInput,
  VersionSource,
} from '@quill/shared';
import { ConflictError, NotFoundError, ValidationError } from '../../middleware/error-handler';
import { logger } from '../../shared/logger';
import type { ContractPatch, ContractStore } from '../../store/types';
import { actor, loadOwnedContract, loadTokenTarget } from './access';
import { allowedTransitions, assertTransition, isTerminal } from './lifecycle';
import {
  formatActivity,
  formatContract,
  formatParty,
  formatSignature,
  formatVersion,
  metadataString,
} from './mappers';

const DAY_MS = 24 * 60 * 60 * 1000;

function validateTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length < MIN_TITLE_LENGTH) {
    throw new ValidationError(`Title must be at least ${MIN_TITLE_LENGTH} characters`, { field: 'title' });
  }
  return trimmed;
}

/** Parses a YYYY-MM-DD filter bound as the start of that UTC day. */
function parseDay(value: string, field: string): Date {
  const day = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(day.getTime())) {
    throw new ValidationError(`${field} must be a date in YYYY-MM-DD format`, { field });
  }
  return day;
}

export class ContractLifecycleService implements ContractService {
  constructor(
    private readonly store: ContractStore,
    private readonly events: EventBus,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async createContract(identity: Identity, input: CreateContractInput): Promise<ContractDto> {
    const title = validateTitle(input.title);

    const contract = await this.store.transaction(async (session) => {
      const created = await session.contracts.create({
        title,
        templateId: input.templateId,
        contractType: input.contractType,
        ownerUserId: identity.id,
        metadata: input.metadata,
      });
      await session.activity.append({ contractId: created.id, action: 'CREATED', ...actor(identity) });
      return created;
    });

    logger.info({ contractId: contract.id, ownerId: identity.id }, 'Contract created');
    await this.publish(createDomainEvent('ContractCreated', contract.id, identity.id, { title }));
    return formatContract(contract);
  }

  async listContracts(identity: Identity, query: ContractListQuery): Promise<PaginatedResult<ContractDto>> {
    const page = Math.max(1, Math.floor(query.page ?? 1));
    const pageSize = Math.min(Math.max(1, Math.floor(query.pageSize ?? DEFAULT_PAGE_SIZE)), MAX_PAGE_SIZE);

    const { items, total } = await this.store.transaction((session) =>
      session.contracts.list({
        ownerId: identity.id,
        status: query.status,
        search: query.search?.trim() || undefined,
        templateId: query.templateId,
        createdFrom: query.fromDate ? parseDay(query.fromDate, 'fromDate') : undefined,
        // toDate covers the whole day
        createdBefore: query.toDate ? new Date(parseDay(query.toDate, 'toDate').getTime() + DAY_MS) : undefined,
        page,
        pageSize,
        sortBy: query.sortBy ?? 'createdAt',
        sortOrder: query.sortOrder ?? 'desc',
      }),
    );

    return {
      data: items.map(formatContract),
      pagination: {
        page,
        pageSize,
        totalPages: Math.ceil(total / pageSize),
        totalItems: total,
      },
    };
  }

  getContract(identity: Identity, contractId: string): Promise<ContractDetailDto> {
    return this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity);
      const [latest, parties, signatures] = await Promise.all([
        session.contracts.latestVersion(contractId),
        session.parties.list(contractId),
        session.signatures.listByContract(contractId),
      ]);

      return {
        ...formatContract(contract),
        content: latest?.content ?? null,
        parties: parties.map(formatParty),
        signatures: signatures.map(formatSignature),
        documentUrl: metadataString(contract.metadata, 'documentUrl'),
        documentHash: metadataString(contract.metadata, 'documentHash'),
      };
    });
  }

  updateContract(identity: Identity, contractId: string, input: UpdateContractInput): Promise<ContractDto> {
    return this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity, { forUpdate: true });

      const patch: ContractPatch = {};
      const fields: string[] = [];
      if (input.title !== undefined) {
        const title = validateTitle(input.title);
        if (title !== contract.title) {
          patch.title = title;
          fields.push('title');
        }
      }
      if (input.metadata !== undefined && !isDeepStrictEqual(input.metadata, contract.metadata)) {
        patch.metadata = input.metadata;
        fields.push('metadata');
      }

      if (fields.length === 0) return formatContract(contract);

      const updated = await session.contracts.update(contractId, patch);
      if (!updated) throw new NotFoundError('Contract', contractId);
      await session.activity.append({ contractId, action: 'UPDATED', ...actor(identity), details: { fields } });
      return formatContract(updated);
    });
  }

  async deleteContract(identity: Identity, contractId: string): Promise<void> {
    await this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity, { forUpdate: true });
      if (contract.status === 'SIGNED') {
        throw new ConflictError('Cannot delete a fully signed contract');
      }
      await session.contracts.softDelete(contractId);
    });

    logger.info({ contractId, ownerId: identity.id }, 'Contract deleted');
    await this.publish(createDomainEvent('ContractDeleted', contractId, identity.id, {}));
  }

  async duplicateContract(identity: Identity, contractId: string): Promise<ContractDto> {
    const copy = await this.store.transaction(async (session) => {
      await loadOwnedContract(session, contractId, identity);
      const duplicated = await session.contracts.duplicate(contractId, identity.id);
      if (!duplicated) throw new NotFoundError('Contract', contractId);
      await session.activity.append({
        contractId: duplicated.id,
        action: 'CREATED',
        ...actor(identity),
        details: { duplicatedFrom: contractId },
      });
      return duplicated;
    });

    await this.publish(
      createDomainEvent('ContractCreated', copy.id, identity.id, { title: copy.title, duplicatedFrom: contractId }),
    );
    return formatContract(copy);
  }

  async updateContent(
    identity: Identity,
    contractId: string,
    content: string,
    source: VersionSource = 'USER',
  ): Promise<ContentUpdateResultDto> {
    const result = await this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity, { forUpdate: true });
      if (isTerminal(contract.status)) {
        throw new ConflictError(`Content is frozen once a contract is ${contract.status}`, 'CONFLICT', {
          status: contract.status,
        });
      }

      const version = await session.contracts.appendVersion({
        contractId,
        content,
        source,
        createdBy: identity.id,
      });

      let updated = contract;
      if (contract.status === 'DRAFT' && source === 'AI') {
        updated = (await session.contracts.update(contractId, { status: 'GENERATED' })) ?? contract;
        await session.activity.append({
          contractId,
          action: 'GENERATED',
          ...actor(identity),
          details: { version: version.version },
        });
      } else {
        updated = (await session.contracts.update(contractId, {})) ?? contract;
        await session.activity.append({
          contractId,
          action: 'UPDATED',
          ...actor(identity),
          details: { field: 'content', version: version.version },
        });
      }
      return { previousStatus: contract.status, contract: updated, version: version.version };
    });

    await this.publish(
      createDomainEvent('ContractContentUpdated', contractId, identity.id, { version: result.version, source }),
    );
    if (result.contract.status !== result.previousStatus) {
      await this.publishStatusChange(contractId, identity, result.previousStatus, result.contract.status, null);
    }
    return { contract: formatContract(result.contract), version: result.version };
  }

  getVersions(identity: Identity, contractId: string): Promise<ContractVersionDto[]> {
    return this.store.transaction(async (session) => {
      await loadOwnedContract(session, contractId, identity);
      const versions = await session.contracts.listVersions(contractId);
      return versions.map(formatVersion);
    });
  }

  async requestTransition(
    identity: Identity,
    contractId: string,
    status: ContractStatus,
    reason?: string,
  ): Promise<ContractDto> {
    const trimmedReason = reason?.trim() || null;
    if (status === 'CANCELLED' && !trimmedReason) {
      throw new ValidationError('Reason required for cancellation', { field: 'reason' });
    }

    const result = await this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity, { forUpdate: true });
      assertTransition(contract.status, status);

      const patch: ContractPatch = { status };
      if (status === 'SIGNED') patch.signedAt = this.clock();

      const updated = await session.contracts.update(contractId, patch);
      if (!updated) throw new NotFoundError('Contract', contractId);
      await session.activity.append({
        contractId,
        action: status === 'CANCELLED' ? 'CANCELLED' : 'UPDATED',
        ...actor(identity),
        details: { oldStatus: contract.status, newStatus: status, reason: trimmedReason },
      });
      return { oldStatus: contract.status, contract: updated };
    });

    logger.info({ contractId, oldStatus: result.oldStatus, newStatus: status }, 'Contract status changed');
    await this.publishStatusChange(contractId, identity, result.oldStatus, status, trimmedReason);
    return formatContract(result.contract);
  }

  getTransitions(identity: Identity, contractId: string): Promise<TransitionsDto> {
    return this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity);
      return { currentStatus: contract.status, allowedTransitions: allowedTransitions(contract.status) };
    });
  }

  getHistory(identity: Identity, contractId: string): Promise<ActivityLogDto[]> {
    return this.store.transaction(async (session) => {
      await loadOwnedContract(session, contractId, identity);
      const entries = await session.activity.list(contractId);
      return entries.map(formatActivity);
    });
  }

  getStats(identity: Identity): Promise<ContractStatsDto> {
    return this.store.transaction((session) => session.contracts.stats(identity.id, this.clock()));
  }

  async getRecent(identity: Identity): Promise<ContractDto[]> {
    const contracts = await this.store.transaction((session) =>
      session.contracts.recent(identity.id, RECENT_CONTRACTS_LIMIT),
    );
    return contracts.map(formatContract);
  }

  async getPending(identity: Identity): Promise<ContractDto[]> {
    const contracts = await this.store.transaction((session) => session.contracts.pending(identity.id));
    return contracts.map(formatContract);
  }

  getPublicView(contractId: string, token: string): Promise<PublicContractViewDto> {
    return this.store.transaction(async (session) => {
      const record = await session.signatures.findValidToken(token, this.clock());
      const target = record && record.contractId === contractId ? await loadTokenTarget(session, record) : null;
      if (!target) {
        throw new ValidationError('Invalid or expired signature token');
      }

      const { contract, party } = target;
      const latest = await session.contracts.latestVersion(contractId);
      return {
        id: contract.id,
        title: contract.title,
        content: latest?.content ?? null,
        party: formatParty(party),
        documentUrl: metadataString(contract.metadata, 'documentUrl'),
      };
    });
  }

  getContents(identity: Identity, contractIds: string[]): Promise<ContractContentDto[]> {
    return this.store.transaction(async (session) => {
      const contents: ContractContentDto[] = [];
      for (const contractId of new Set(contractIds)) {
        const contract = await session.contracts.findById(contractId);
        if (!contract || contract.ownerUserId !== identity.id) continue;
        const latest = await session.contracts.latestVersion(contractId);
        contents.push({ id: contract.id, title: contract.title, content: latest?.content ?? null });
      }
      return contents;
    });
  }

  private publishStatusChange(
    contractId: string,
    identity: Identity,
    oldStatus: ContractStatus,
    newStatus: ContractStatus,
    reason: string | null,
  ): Promise<void> {
    return this.publish(
      createDomainEvent('ContractStatusChanged', contractId, identity.id, { oldStatus, newStatus, reason }),
    );
  }

  private publish(event: DomainEvent): Promise<void> {
    return this.events.publish(event);
  }
}
