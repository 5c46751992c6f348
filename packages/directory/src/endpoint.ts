import type { Endpoint, RatedEndpoint } from './types';

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/** Milliseconds since the endpoint last synchronised, or undefined when that is unknown. */
export const endpointAgeMs = (endpoint: Endpoint, nowMs: number = Date.now()): number | undefined => {
  if (endpoint.lastSyncMs === undefined) {
    return undefined;
  }
  return nowMs - endpoint.lastSyncMs;
};

/**
 * Hours as whole-hours component plus minutes component / 60. Both components truncate
 * toward zero, so an endpoint synced in the future has a small negative age.
 */
export const ageInHours = (ageMs: number): number => {
  const hours = Math.trunc(ageMs / MS_PER_HOUR);
  const minutes = Math.trunc(ageMs / MS_PER_MINUTE) % 60;
  return hours + minutes / 60;
};

/** Copy of the endpoint carrying a measured rate. */
export const withRate = (endpoint: Endpoint, rate: number): RatedEndpoint => ({ ...endpoint, rate });
