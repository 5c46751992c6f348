/** Public status document listing every known mirror. */
export const DEFAULT_STATUS_URL = 'https://archlinux.org/mirrors/status/json';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
