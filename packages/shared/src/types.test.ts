/**
 * Shared Types & Constants Tests
 *
 * Validates that exported enums, constants and helpers are correct.
 */

import { describe, it, expect } from 'vitest';
import {
  APP_NAME,
  APP_VERSION,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MIN_TITLE_LENGTH,
  VERSION_APPEND_MAX_ATTEMPTS,
  SIGNATURE_TOKEN_DEFAULT_TTL_MINUTES,
  SIGNATURE_TOKEN_MAX_TTL_MINUTES,
} from './constants';
import {
  CONTRACT_STATUSES,
  TERMINAL_STATUSES,
  ACTIVITY_ACTIONS,
  PARTY_ROLES,
  SIGNATURE_STATUSES,
  displayName,
} from './types';

describe('Constants', () => {
  it('APP_NAME is Quill Contracts', () => {
    expect(APP_NAME).toBe('Quill Contracts');
  });

  it('APP_VERSION follows semver', () => {
    expect(APP_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  describe('Pagination', () => {
    it('DEFAULT_PAGE_SIZE is 20', () => {
      expect(DEFAULT_PAGE_SIZE).toBe(20);
    });

    it('MAX_PAGE_SIZE caps at 100', () => {
      expect(MAX_PAGE_SIZE).toBeGreaterThan(DEFAULT_PAGE_SIZE);
      expect(MAX_PAGE_SIZE).toBe(100);
    });
  });

  describe('Contracts', () => {
    it('titles need at least 3 characters', () => {
      expect(MIN_TITLE_LENGTH).toBe(3);
    });

    it('version claims retry at most 3 times', () => {
      expect(VERSION_APPEND_MAX_ATTEMPTS).toBe(3);
    });
  });

  describe('Signatures', () => {
    it('default token lifetime is within the maximum', () => {
      expect(SIGNATURE_TOKEN_DEFAULT_TTL_MINUTES).toBe(4320);
      expect(SIGNATURE_TOKEN_MAX_TTL_MINUTES).toBeGreaterThan(SIGNATURE_TOKEN_DEFAULT_TTL_MINUTES);
    });
  });
});

describe('Enumerations', () => {
  it('lists the six contract statuses in lifecycle order', () => {
    expect(CONTRACT_STATUSES).toEqual(['DRAFT', 'GENERATED', 'SIGNING', 'SIGNED', 'CANCELLED', 'EXPIRED']);
  });

  it('terminal statuses are a subset of all statuses', () => {
    expect(TERMINAL_STATUSES).toEqual(['SIGNED', 'CANCELLED', 'EXPIRED']);
    for (const status of TERMINAL_STATUSES) {
      expect(CONTRACT_STATUSES).toContain(status);
    }
  });

  it('lists activity actions, party roles and signature statuses', () => {
    expect(ACTIVITY_ACTIONS).toEqual(['CREATED', 'UPDATED', 'GENERATED', 'SIGNED', 'SENT', 'CANCELLED']);
    expect(PARTY_ROLES).toEqual(['HOST', 'GUEST', 'WITNESS']);
    expect(SIGNATURE_STATUSES).toEqual(['PENDING', 'INVITED', 'SIGNED']);
  });
});

describe('displayName', () => {
  it('prefers the identity name', () => {
    expect(displayName({ id: 'u1', email: 'ana@example.com', name: 'Ana Ruiz' })).toBe('Ana Ruiz');
  });

  it('falls back to email when name is missing or blank', () => {
    expect(displayName({ id: 'u1', email: 'ana@example.com', name: null })).toBe('ana@example.com');
    expect(displayName({ id: 'u1', email: 'ana@example.com', name: '   ' })).toBe('ana@example.com');
  });
});
