import type { Directory, Endpoint, RatedEndpoint } from '@mirrorrank/directory';
import { ProbeError } from './errors';
import { probeEndpoint } from './prober';
import type { ProbeFailureKind, ProbeOutcome, Prober, RateUpdate, UpdateRatesOptions } from './types';

type Completion =
  | { index: number; ok: true; endpoint: RatedEndpoint }
  | { index: number; ok: false; reason: ProbeFailureKind; message: string };

const toFailure = (index: number, error: unknown): Completion => {
  if (error instanceof ProbeError) {
    return { index, ok: false, reason: error.kind, message: error.message };
  }
  return { index, ok: false, reason: 'network', message: error instanceof Error ? error.message : String(error) };
};

// Never rejects, so abandoned probes cannot surface as unhandled rejections.
const settle = (index: number, run: () => Promise<RatedEndpoint>): Promise<Completion> => {
  return Promise.resolve()
    .then(run)
    .then(
      (endpoint): Completion => ({ index, ok: true, endpoint }),
      (error: unknown) => toFailure(index, error),
    );
};

/** Updated endpoints first, then every original endpoint without a successful probe, in original order. */
const reconcile = (original: readonly Endpoint[], updated: readonly Endpoint[]): Endpoint[] => {
  const probed = new Set(updated.map((endpoint) => endpoint.url));
  return [...updated, ...original.filter((endpoint) => !probed.has(endpoint.url))];
};

/**
 * Probe every endpoint concurrently and stop once `limit` probes have succeeded.
 * Failed probes are logged and carried over without a rate; probes still running at that
 * point are aborted and their results discarded.
 */
export const updateRates = async (directory: Directory, options: UpdateRatesOptions): Promise<RateUpdate> => {
  const original = directory.endpoints;
  const probe: Prober = options.probe ?? probeEndpoint;
  const logger = options.logger;
  const outcomes: ProbeOutcome[] = original.map(
    (endpoint): ProbeOutcome => ({ url: endpoint.url, status: 'abandoned' }),
  );
  const updated: RatedEndpoint[] = [];
  let remaining = Math.max(0, Math.min(options.limit, original.length));

  if (remaining > 0) {
    const batch = new AbortController();
    const pending = new Map<number, Promise<Completion>>();
    original.forEach((endpoint, index) => {
      const run = () =>
        probe(endpoint, {
          timeoutMs: options.timeoutMs,
          resourcePath: options.resourcePath,
          signal: batch.signal,
        });
      pending.set(index, settle(index, run));
    });

    while (pending.size > 0 && remaining > 0) {
      const completion = await Promise.race(pending.values());
      pending.delete(completion.index);
      const url = original[completion.index].url;

      if (completion.ok) {
        updated.push(completion.endpoint);
        outcomes[completion.index] = { url, status: 'ok', rate: completion.endpoint.rate };
        remaining -= 1;
        logger?.(`download rate updated for ${url}`, { rate: completion.endpoint.rate });
      } else {
        outcomes[completion.index] = {
          url,
          status: 'failed',
          reason: completion.reason,
          message: completion.message,
        };
        logger?.(`failed to update ${url}`, { reason: completion.reason, message: completion.message });
      }
    }

    if (pending.size > 0) {
      logger?.('enough mirrors updated', { abandoned: pending.size });
      batch.abort();
    }
  }

  return {
    directory: { ...directory, endpoints: reconcile(original, updated) },
    outcomes,
  };
};
