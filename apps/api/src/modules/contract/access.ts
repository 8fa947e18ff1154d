import { displayName } from '@quill/shared';
import type { Identity } from '@quill/shared';
import { ForbiddenError, NotFoundError } from '../../middleware/error-handler';
import type { ContractRecord, PartyRecord, SignatureTokenRecord, StoreSession } from '../../store/types';

/**
 * Loads a live contract and checks that `identity` owns it.
 * Soft-deleted contracts are reported as missing.
 */
export async function loadOwnedContract(
  session: StoreSession,
  contractId: string,
  identity: Identity,
  options: { forUpdate?: boolean } = {},
): Promise<ContractRecord> {
  const contract = await session.contracts.findById(contractId, { forUpdate: options.forUpdate });
  if (!contract) throw new NotFoundError('Contract', contractId);
  if (contract.ownerUserId !== identity.id) {
    throw new ForbiddenError('You do not have access to this contract');
  }
  return contract;
}

/** Actor columns of an activity entry. */
export function actor(identity: Identity): { userId: string; userName: string } {
  return { userId: identity.id, userName: displayName(identity) };
}

/**
 * Resolves what an unexpired guest token points at, or null once the token
 * can no longer be acted on: the contract left SIGNING or the party signed.
 */
export async function loadTokenTarget(
  session: StoreSession,
  token: SignatureTokenRecord,
): Promise<{ contract: ContractRecord; party: PartyRecord } | null> {
  const [contract, party] = await Promise.all([
    session.contracts.findById(token.contractId),
    session.parties.findById(token.partyId),
  ]);
  if (!contract || contract.status !== 'SIGNING') return null;
  if (!party || party.contractId !== contract.id || party.signatureStatus === 'SIGNED') return null;
  return { contract, party };
}
