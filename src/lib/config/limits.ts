export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_BASE_BACKOFF_MS = 500;

// Clio caps list endpoints at 200 rows per page.
export const MATTER_PAGE_LIMIT = 200;

export const RESPONSE_TEXT_LIMIT = 2000;
