import type { Directory, Endpoint, SortKey } from './types';

type Comparator = (a: Endpoint, b: Endpoint) => number;

/**
 * Total order over optional numbers: undefined and NaN compare equal to each other and
 * greater than every real number, so they always end up last in an ascending sort.
 */
export const compareTotal = (a: number | undefined, b: number | undefined): number => {
  if (a === undefined || Number.isNaN(a)) {
    return b === undefined || Number.isNaN(b) ? 0 : 1;
  }
  if (b === undefined || Number.isNaN(b)) {
    return -1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

const negate = (value: number | undefined): number | undefined => (value === undefined ? undefined : -value);

const round = (value: number | undefined): number | undefined => (value === undefined ? undefined : Math.round(value));

const compareStrings = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

const comparators: Record<SortKey, Comparator> = {
  // oldest sync first, unknown sync before everything
  age: (a, b) => compareTotal(a.lastSyncMs ?? Number.NEGATIVE_INFINITY, b.lastSyncMs ?? Number.NEGATIVE_INFINITY),
  rate: (a, b) => compareTotal(negate(a.rate), negate(b.rate)),
  country: (a, b) => compareStrings(a.country ?? '', b.country ?? ''),
  score: (a, b) => compareTotal(round(a.score), round(b.score)),
  delay: (a, b) => compareTotal(round(a.delay), round(b.delay)),
};

/** Stable sort by `key`; ties keep their relative order. */
export const rankDirectory = (directory: Directory, key: SortKey): Directory => {
  return {
    ...directory,
    endpoints: [...directory.endpoints].sort(comparators[key]),
  };
};

/** Keep the first `count` endpoints. */
export const truncateDirectory = (directory: Directory, count: number): Directory => {
  const limit = Math.max(0, Math.min(count, directory.endpoints.length));
  return {
    ...directory,
    endpoints: directory.endpoints.slice(0, limit),
  };
};
