import { ageInHours, endpointAgeMs } from './endpoint';
import type { Directory, Endpoint, FilterCriteria } from './types';

type Predicate = (endpoint: Endpoint) => boolean;

const buildPredicates = (criteria: FilterCriteria, nowMs: number): Predicate[] => {
  const predicates: Predicate[] = [];
  const { maxAgeHours, protocols } = criteria;

  if (maxAgeHours !== undefined) {
    predicates.push((endpoint) => {
      const ageMs = endpointAgeMs(endpoint, nowMs);
      return ageMs !== undefined && ageInHours(ageMs) < maxAgeHours;
    });
  }
  if (criteria.isos) {
    predicates.push((endpoint) => endpoint.isos === true);
  }
  if (criteria.ipv4) {
    predicates.push((endpoint) => endpoint.ipv4 === true);
  }
  if (criteria.ipv6) {
    predicates.push((endpoint) => endpoint.ipv6 === true);
  }
  if (protocols && protocols.length > 0) {
    const allowed = new Set(protocols);
    predicates.push((endpoint) => allowed.has(endpoint.protocol));
  }

  return predicates;
};

/** Keep the endpoints that satisfy every supplied criterion, in their original order. */
export const filterDirectory = (
  directory: Directory,
  criteria: FilterCriteria = {},
  nowMs: number = Date.now(),
): Directory => {
  const predicates = buildPredicates(criteria, nowMs);
  return {
    ...directory,
    endpoints: directory.endpoints.filter((endpoint) => predicates.every((predicate) => predicate(endpoint))),
  };
};
