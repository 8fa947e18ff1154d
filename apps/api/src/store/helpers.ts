import { DUPLICATE_TITLE_SUFFIX, MAX_TITLE_LENGTH } from '@quill/shared';
import type { ContractStatus } from '@quill/shared';

/** Statuses that still wait on the owner or a signer. */
export const PENDING_STATUSES: readonly ContractStatus[] = ['DRAFT', 'GENERATED', 'SIGNING'];

/** Title of a duplicate, shortened so the suffix still fits the column. */
export function duplicateTitle(title: string): string {
  return `${title.slice(0, MAX_TITLE_LENGTH - DUPLICATE_TITLE_SUFFIX.length)}${DUPLICATE_TITLE_SUFFIX}`;
}

/** First instant of the UTC calendar month containing `now`. */
export function startOfUtcMonth(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

/** Escapes LIKE wildcards so user search text matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
