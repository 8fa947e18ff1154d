// === Application Constants ===

export const APP_NAME = 'Quill Contracts';
export const APP_VERSION = '0.1.0';

// === Pagination ===

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/** Largest page number a list request may ask for. */
export const MAX_PAGE = 100_000;

// === Identity ===

/** Column width of user ids, emails and display names. */
export const MAX_IDENTITY_LENGTH = 255;
export const MAX_NAME_PART_LENGTH = 100;
export const USER_PROVISION_MAX_ATTEMPTS = 3;

// === Contracts ===

export const MIN_TITLE_LENGTH = 3;
export const MAX_TITLE_LENGTH = 500;
export const RECENT_CONTRACTS_LIMIT = 10;
export const DUPLICATE_TITLE_SUFFIX = ' (Copy)';
export const MAX_TEMPLATE_ID_LENGTH = 100;
export const MAX_PARTIES_PER_CONTRACT = 1000;
export const MAX_BULK_DOWNLOAD = 50;

/** Upper bound on compare-and-swap attempts when claiming a version number. */
export const VERSION_APPEND_MAX_ATTEMPTS = 3;

// === Signatures ===

export const SIGNATURE_TOKEN_BYTES = 32;
export const SIGNATURE_TOKEN_DEFAULT_TTL_MINUTES = 4320; // 3 days
export const SIGNATURE_TOKEN_MAX_TTL_MINUTES = 43_200; // 30 days
