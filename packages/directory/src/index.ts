export { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_STATUS_URL } from './defaults';
export { decodeDirectory, parseDirectoryJson } from './decode';
export { ageInHours, endpointAgeMs, withRate } from './endpoint';
export { DirectoryDecodeError, DirectoryFetchError } from './errors';
export { fetchDirectory } from './fetch';
export { filterDirectory } from './filter';
export { compareTotal, rankDirectory, truncateDirectory } from './rank';
export { PROTOCOLS, SORT_KEYS } from './types';
export { joinUrlPath, withTimeout } from './utils';
export type {
  Directory,
  DirectoryFetcher,
  Endpoint,
  FetchDirectoryOptions,
  FilterCriteria,
  Protocol,
  RatedEndpoint,
  SortKey,
} from './types';
export type { TimeoutHandle } from './utils';
