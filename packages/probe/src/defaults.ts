/** Repository database present on every mirror; large enough to give a meaningful transfer. */
export const DEFAULT_PROBE_PATH = '/extra/os/x86_64/extra.db';

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;
