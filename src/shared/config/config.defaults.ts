export const DEFAULT_PROXY_WINDOW_MS = 60_000;
export const DEFAULT_PROXY_MAX_REQUESTS_PER_WINDOW = 10;
export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;
export const DEFAULT_MAX_ATTEMPTS = 20;
export const DEFAULT_BACKOFF_MIN_MS = 1000;
export const DEFAULT_BACKOFF_MAX_MS = 3000;
export const DEFAULT_ARTIFACT_ROOT = 'downloads';
export const DEFAULT_ARTIFACT_TTL_MINUTES = 60;
