import { fetch } from 'undici';
import { joinUrlPath, withRate, withTimeout } from '@mirrorrank/directory';
import { DEFAULT_PROBE_PATH } from './defaults';
import { ProbeError } from './errors';
import type { Prober } from './types';

/** bytes / (1000 × elapsed ms); a transfer of zero bytes yields NaN. */
export const computeRate = (bytes: number, elapsedMs: number): number => {
  if (bytes === 0) {
    return Number.NaN;
  }
  return bytes / (1000 * elapsedMs);
};

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  }
  return String(error);
};

/** Download the probe resource from one endpoint and time the whole transfer. */
export const probeEndpoint: Prober = async (endpoint, options = {}) => {
  const target = joinUrlPath(endpoint.url, options.resourcePath ?? DEFAULT_PROBE_PATH);
  const timeout = withTimeout(options.timeoutMs, options.signal);
  const start = process.hrtime.bigint();

  try {
    const response = await fetch(target, { signal: timeout.signal });
    if (!response.ok) {
      await response.body?.cancel();
      throw new ProbeError(endpoint.url, 'network', `unexpected status ${response.status}`);
    }
    const body = await response.arrayBuffer();
    const elapsedMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    return withRate(endpoint, computeRate(body.byteLength, elapsedMs));
  } catch (error) {
    if (error instanceof ProbeError) {
      throw error;
    }
    if (timeout.timedOut()) {
      throw new ProbeError(endpoint.url, 'timeout', `no complete response within ${options.timeoutMs}ms`);
    }
    if (options.signal?.aborted) {
      throw new ProbeError(endpoint.url, 'aborted', 'cancelled by caller');
    }
    throw new ProbeError(endpoint.url, 'network', describeError(error));
  } finally {
    timeout.cancel();
  }
};
