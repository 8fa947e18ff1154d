import { describe, it, expect, vi } from 'vitest';
import { CONTRACT_STATUSES } from '@quill/shared';
import type { ContractStatus } from '@quill/shared';
import { allowedTransitions, assertTransition, canTransition, isTerminal, TRANSITIONS } from './lifecycle';
import { InvalidTransitionError } from '../../middleware/error-handler';

vi.mock('../../shared/logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const ALLOWED: Array<[ContractStatus, ContractStatus]> = [
  ['DRAFT', 'GENERATED'],
  ['DRAFT', 'CANCELLED'],
  ['GENERATED', 'DRAFT'],
  ['GENERATED', 'SIGNING'],
  ['GENERATED', 'CANCELLED'],
  ['SIGNING', 'SIGNED'],
  ['SIGNING', 'CANCELLED'],
  ['SIGNING', 'EXPIRED'],
];

describe('contract lifecycle', () => {
  it('allows exactly the listed transitions', () => {
    for (const from of CONTRACT_STATUSES) {
      for (const to of CONTRACT_STATUSES) {
        const expected = ALLOWED.some(([f, t]) => f === from && t === to);
        expect(canTransition(from, to), `${from} -> ${to}`).toBe(expected);
      }
    }
  });

  it('treats SIGNED, CANCELLED and EXPIRED as terminal', () => {
    expect(CONTRACT_STATUSES.filter(isTerminal)).toEqual(['SIGNED', 'CANCELLED', 'EXPIRED']);
    for (const status of CONTRACT_STATUSES.filter(isTerminal)) {
      expect(allowedTransitions(status)).toEqual([]);
    }
  });

  it('returns a copy of the allowed set', () => {
    const allowed = allowedTransitions('GENERATED');
    allowed.push('SIGNED');
    expect(TRANSITIONS.GENERATED).toEqual(['DRAFT', 'SIGNING', 'CANCELLED']);
  });

  it('rejects a disallowed transition with both statuses in the details', () => {
    expect(() => assertTransition('SIGNING', 'DRAFT')).toThrow(InvalidTransitionError);

    let caught: unknown = null;
    try {
      assertTransition('SIGNED', 'CANCELLED');
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({
      statusCode: 400,
      code: 'INVALID_TRANSITION',
      details: { oldStatus: 'SIGNED', newStatus: 'CANCELLED' },
    });
  });

  it('never allows a self transition', () => {
    for (const status of CONTRACT_STATUSES) {
      expect(canTransition(status, status)).toBe(false);
    }
  });
});
