export { updateRates } from './coordinator';
export { DEFAULT_PROBE_PATH, DEFAULT_PROBE_TIMEOUT_MS } from './defaults';
export { ProbeError } from './errors';
export { computeRate, probeEndpoint } from './prober';
export type {
  ProbeFailureKind,
  ProbeLogger,
  ProbeOptions,
  ProbeOutcome,
  Prober,
  RateUpdate,
  UpdateRatesOptions,
} from './types';
