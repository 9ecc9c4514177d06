export const DEFAULT_API_BASE_URL = 'https://api.zotero.org';
export const DEFAULT_BIBLIOGRAPHY_DIR = 'bibliography';

/** Output name of the personal library. Groups use `${groupId}.bib`. */
export const USER_LIBRARY_FILE = 'zotero.bib';
export const VERSION_FILE_SUFFIX = '-last-modified-version';

export const LAST_MODIFIED_VERSION_HEADER = 'last-modified-version';
export const ZOTERO_API_VERSION = '3';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 100;
export const DEFAULT_RETRY_MAX_DELAY_MS = 5_000;
