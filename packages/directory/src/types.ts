export const PROTOCOLS = ['ftp', 'https', 'http', 'rsync'] as const;

export type Protocol = (typeof PROTOCOLS)[number];

export const SORT_KEYS = ['age', 'rate', 'country', 'score', 'delay'] as const;

/** Key used by the ranker; see rank.ts for the missing-value policy of each. */
export type SortKey = (typeof SORT_KEYS)[number];

/** Endpoint captures one mirror as reported by the status document. */
export interface Endpoint {
  readonly url: string;
  readonly protocol: Protocol;
  readonly score?: number; // lower is better
  readonly delay?: number; // seconds behind the tier-0 mirror, lower is better
  readonly country?: string;
  readonly countryCode?: string;
  readonly lastSyncMs?: number;
  readonly isos?: boolean;
  readonly ipv4?: boolean;
  readonly ipv6?: boolean;
  readonly details: string;
  // set only by a successful probe; NaN when the probe received zero bytes
  readonly rate?: number;
}

/** Endpoint returned by a successful probe. */
export type RatedEndpoint = Endpoint & { readonly rate: number };

/** An ordered set of endpoints plus where it came from. */
export interface Directory {
  readonly endpoints: readonly Endpoint[];
  readonly source?: string;
}

/** Criteria understood by filterDirectory. Absent criteria do not filter. */
export interface FilterCriteria {
  maxAgeHours?: number;
  isos?: boolean;
  ipv4?: boolean;
  ipv6?: boolean;
  protocols?: readonly Protocol[];
}

/** Returns the raw status document body for a URL. */
export type DirectoryFetcher = (url: string, signal?: AbortSignal) => Promise<string>;

export interface FetchDirectoryOptions {
  fetcher?: DirectoryFetcher;
  timeoutMs?: number;
  signal?: AbortSignal;
}
