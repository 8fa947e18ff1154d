/**
 * Party coordinator: the signer roster of a contract.
 *
 * A party moves PENDING -> INVITED -> SIGNED and never back. Once SIGNED it
 * can no longer be removed, whatever the contract's own status.
 */

import type { AddPartyInput, ContractPartyDto, Identity, PartyService } from '@quill/shared';
import { ConflictError, DuplicateEmailError, NotFoundError, ValidationError } from '../../middleware/error-handler';
import type { ContractStore, PartyRecord, StoreSession } from '../../store/types';
import { actor, loadOwnedContract } from './access';
import { isTerminal } from './lifecycle';
import { formatParty } from './mappers';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class PartyCoordinator implements PartyService {
  constructor(private readonly store: ContractStore) {}

  listParties(identity: Identity, contractId: string): Promise<ContractPartyDto[]> {
    return this.store.transaction(async (session) => {
      await loadOwnedContract(session, contractId, identity);
      const parties = await session.parties.list(contractId);
      return parties.map(formatParty);
    });
  }

  addParty(identity: Identity, contractId: string, input: AddPartyInput): Promise<ContractPartyDto> {
    const email = normalizeEmail(input.email);
    const name = input.name.trim();
    const signingOrder = input.order ?? 1;
    if (!name) throw new ValidationError('Party name is required', { field: 'name' });
    if (!Number.isInteger(signingOrder) || signingOrder < 1) {
      throw new ValidationError('Signing order must be a positive integer', { field: 'order' });
    }

    return this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity, { forUpdate: true });
      if (isTerminal(contract.status)) {
        throw new ConflictError(`Cannot add a party to a ${contract.status} contract`);
      }

      const party = await session.parties.add({ contractId, role: input.role, name, email, signingOrder });
      if (!party) throw new DuplicateEmailError(email);

      await session.activity.append({
        contractId,
        action: 'UPDATED',
        ...actor(identity),
        details: { field: 'parties', partyId: party.id, change: 'added' },
      });
      return formatParty(party);
    });
  }

  async removeParty(identity: Identity, contractId: string, partyId: string): Promise<void> {
    await this.store.transaction(async (session) => {
      await loadOwnedContract(session, contractId, identity, { forUpdate: true });

      const party = await session.parties.findById(partyId);
      if (!party || party.contractId !== contractId) throw new NotFoundError('Party', partyId);
      if (party.signatureStatus === 'SIGNED') {
        throw new ConflictError('A party who already signed cannot be removed');
      }

      await session.parties.remove(partyId, contractId);
      await session.activity.append({
        contractId,
        action: 'UPDATED',
        ...actor(identity),
        details: { field: 'parties', partyId, change: 'removed' },
      });
    });
  }

  /**
   * Records a completed signing act inside the signing transaction.
   * A party that already signed is returned unchanged.
   */
  async markSigned(session: StoreSession, partyId: string, signedAt: Date): Promise<PartyRecord> {
    const party = await session.parties.findById(partyId);
    if (!party) throw new NotFoundError('Party', partyId);
    if (party.signatureStatus === 'SIGNED') return party;
    return (await session.parties.setStatus(partyId, 'SIGNED', signedAt)) ?? party;
  }

  /** PENDING -> INVITED; later statuses are left alone. */
  async markInvited(session: StoreSession, partyId: string): Promise<PartyRecord> {
    const party = await session.parties.findById(partyId);
    if (!party) throw new NotFoundError('Party', partyId);
    if (party.signatureStatus !== 'PENDING') return party;
    return (await session.parties.setStatus(partyId, 'INVITED')) ?? party;
  }
}
