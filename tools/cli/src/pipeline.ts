import { readFile } from 'node:fs/promises';
import {
  fetchDirectory,
  filterDirectory,
  parseDirectoryJson,
  rankDirectory,
  truncateDirectory,
} from '@mirrorrank/directory';
import type { Directory, DirectoryFetcher, FilterCriteria } from '@mirrorrank/directory';
import { updateRates } from '@mirrorrank/probe';
import type { ProbeLogger, ProbeOutcome, Prober } from '@mirrorrank/probe';
import type { MirrorrankConfig } from './config';

export type SelectionConfig = Pick<
  MirrorrankConfig,
  'sort' | 'number' | 'maxAgeHours' | 'isos' | 'ipv4' | 'ipv6' | 'protocols' | 'timeoutSeconds' | 'probeCount'
>;

export type SelectionDeps = {
  probe?: Prober;
  logger?: ProbeLogger;
  nowMs?: number;
};

export type Selection = {
  directory: Directory;
  outcomes: ProbeOutcome[];
};

export type OutcomeSummary = Record<ProbeOutcome['status'], number>;

export const criteriaFromConfig = (config: SelectionConfig): FilterCriteria => ({
  maxAgeHours: config.maxAgeHours,
  isos: config.isos,
  ipv4: config.ipv4,
  ipv6: config.ipv6,
  protocols: config.protocols,
});

/** Read the status document from `statusFile` when set, otherwise download it from `statusUrl`. */
export const loadDirectory = async (
  config: Pick<MirrorrankConfig, 'statusUrl' | 'statusFile'>,
  fetcher?: DirectoryFetcher,
): Promise<Directory> => {
  if (config.statusFile) {
    const text = await readFile(config.statusFile, 'utf8');
    return parseDirectoryJson(text, config.statusFile);
  }
  return fetchDirectory(config.statusUrl, { fetcher });
};

/** Filter, probe when ranking by rate, rank, then keep the first `number` endpoints. */
export const selectMirrors = async (
  directory: Directory,
  config: SelectionConfig,
  deps: SelectionDeps = {},
): Promise<Selection> => {
  const filtered = filterDirectory(directory, criteriaFromConfig(config), deps.nowMs);

  let candidates = filtered;
  let outcomes: ProbeOutcome[] = [];
  if (config.sort === 'rate') {
    const update = await updateRates(filtered, {
      limit: config.probeCount,
      timeoutMs: config.timeoutSeconds === undefined ? undefined : config.timeoutSeconds * 1000,
      probe: deps.probe,
      logger: deps.logger,
    });
    candidates = update.directory;
    outcomes = update.outcomes;
  }

  const ranked = rankDirectory(candidates, config.sort);
  return {
    directory: truncateDirectory(ranked, config.number),
    outcomes,
  };
};

export const summarizeOutcomes = (outcomes: readonly ProbeOutcome[]): OutcomeSummary => {
  const summary: OutcomeSummary = { ok: 0, failed: 0, abandoned: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
};
