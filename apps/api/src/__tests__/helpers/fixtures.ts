import type { ContractStatus, Identity } from '@quill/shared';
import type { MemoryStore } from '../fakes/memory-store';

export const OWNER: Identity = { id: 'user-owner', email: 'owner@example.com', name: 'Olivia Owner' };
export const OTHER: Identity = { id: 'user-other', email: 'other@example.com', name: null };

/** Fixed clock for services under test. */
export const FIXED_NOW = new Date('2025-06-15T12:00:00.000Z');
export const fixedClock = () => FIXED_NOW;

/** Forces a contract into `status` without going through the state machine. */
export async function forceStatus(store: MemoryStore, contractId: string, status: ContractStatus): Promise<void> {
  await store.transaction((session) => session.contracts.update(contractId, { status }));
}
