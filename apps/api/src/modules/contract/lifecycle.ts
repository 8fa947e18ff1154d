/**
 * Contract status state machine.
 *
 * SIGNED, CANCELLED and EXPIRED have no outgoing transitions. Every status
 * change in the API goes through `assertTransition`.
 */

import { TERMINAL_STATUSES } from '@quill/shared';
import type { ContractStatus } from '@quill/shared';
import { InvalidTransitionError } from '../../middleware/error-handler';

export const TRANSITIONS: Readonly<Record<ContractStatus, readonly ContractStatus[]>> = {
  DRAFT: ['GENERATED', 'CANCELLED'],
  GENERATED: ['DRAFT', 'SIGNING', 'CANCELLED'],
  SIGNING: ['SIGNED', 'CANCELLED', 'EXPIRED'],
  SIGNED: [],
  CANCELLED: [],
  EXPIRED: [],
};

export function allowedTransitions(from: ContractStatus): ContractStatus[] {
  return [...TRANSITIONS[from]];
}

export function canTransition(from: ContractStatus, to: ContractStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ContractStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function assertTransition(from: ContractStatus, to: ContractStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
}
