import type { Directory, Endpoint, RatedEndpoint } from '@mirrorrank/directory';

export type ProbeFailureKind = 'timeout' | 'network' | 'aborted';

export type ProbeOptions = {
  timeoutMs?: number; // no deadline when absent, zero or negative
  signal?: AbortSignal;
  resourcePath?: string;
};

/** Measures one endpoint and resolves with a copy carrying the rate, or rejects. */
export type Prober = (endpoint: Endpoint, options?: ProbeOptions) => Promise<RatedEndpoint>;

export type ProbeOutcome =
  | { url: string; status: 'ok'; rate: number }
  | { url: string; status: 'failed'; reason: ProbeFailureKind; message: string }
  | { url: string; status: 'abandoned' };

export type ProbeLogger = (message: string, detail?: unknown) => void;

export type UpdateRatesOptions = {
  limit: number; // successes to wait for, clamped to the directory size
  timeoutMs?: number;
  resourcePath?: string;
  probe?: Prober;
  logger?: ProbeLogger;
};

export type RateUpdate = {
  directory: Directory;
  outcomes: ProbeOutcome[]; // one per input endpoint, in input order
};
