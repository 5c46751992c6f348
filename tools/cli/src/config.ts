import { z } from 'zod';
import { DEFAULT_STATUS_URL, PROTOCOLS, SORT_KEYS } from '@mirrorrank/directory';
import type { Protocol, SortKey } from '@mirrorrank/directory';
import { DEFAULT_PROBE_TIMEOUT_MS } from '@mirrorrank/probe';
import { parseList } from './lib';
import { LOG_LEVELS } from './logging';
import type { LogLevel } from './logging';

export type MirrorrankConfig = {
  statusUrl: string;
  statusFile?: string;
  sort: SortKey;
  number: number;
  maxAgeHours?: number;
  isos: boolean;
  ipv4: boolean;
  ipv6: boolean;
  protocols: Protocol[];
  timeoutSeconds?: number; // probe deadline; undefined means none
  probeCount: number; // successful probes to wait for when sorting by rate
  savePath?: string;
  logLevel: LogLevel;
};

export const defaultConfig: MirrorrankConfig = {
  statusUrl: DEFAULT_STATUS_URL,
  statusFile: undefined,
  sort: 'score',
  number: 20,
  maxAgeHours: undefined,
  isos: false,
  ipv4: false,
  ipv6: false,
  protocols: [],
  timeoutSeconds: DEFAULT_PROBE_TIMEOUT_MS / 1000,
  probeCount: 20,
  savePath: undefined,
  logLevel: 'info',
};

export class ConfigError extends Error {
  public issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const toErrors = (issues: z.ZodIssue[]): string[] => {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
    return `${path}: ${issue.message}`;
  });
};

const configSchema = z.object({
  statusUrl: z.string().url(),
  statusFile: z.string().min(1).optional(),
  sort: z.enum(SORT_KEYS),
  number: z.coerce.number().int().positive(),
  maxAgeHours: z.coerce.number().finite().optional(),
  isos: z.boolean(),
  ipv4: z.boolean(),
  ipv6: z.boolean(),
  protocols: z.array(z.enum(PROTOCOLS)),
  timeoutSeconds: z.coerce.number().finite().optional(),
  probeCount: z.coerce.number().int().nonnegative().optional(),
  savePath: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS),
});

const isFlagSet = (value?: string): boolean => value?.toLowerCase() === 'true';

// An exported but empty variable counts as unset.
const readEnv = (env: Record<string, string | undefined>, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

/**
 * Merge defaults, MIRRORRANK_* environment variables and command-line flags, in that order
 * of precedence from lowest to highest. Empty environment variables are ignored.
 * A probe timeout of zero or less disables the deadline.
 */
export const buildConfig = (
  args: Record<string, string>,
  env: Record<string, string | undefined> = process.env,
): MirrorrankConfig => {
  const candidate = {
    statusUrl: args.url ?? readEnv(env, 'MIRRORRANK_URL') ?? defaultConfig.statusUrl,
    statusFile: args.file,
    sort: args.sort ?? readEnv(env, 'MIRRORRANK_SORT') ?? defaultConfig.sort,
    number: args.number ?? readEnv(env, 'MIRRORRANK_NUMBER') ?? defaultConfig.number,
    maxAgeHours: args.age ?? readEnv(env, 'MIRRORRANK_AGE'),
    isos: isFlagSet(args.isos),
    ipv4: isFlagSet(args.ipv4),
    ipv6: isFlagSet(args.ipv6),
    protocols: parseList(args.protocol ?? readEnv(env, 'MIRRORRANK_PROTOCOLS')) ?? defaultConfig.protocols,
    timeoutSeconds: args.timeout ?? readEnv(env, 'MIRRORRANK_TIMEOUT') ?? defaultConfig.timeoutSeconds,
    probeCount: args['probe-count'] ?? readEnv(env, 'MIRRORRANK_PROBE_COUNT'),
    savePath: args.save,
    logLevel: isFlagSet(args.verbose) ? 'debug' : readEnv(env, 'MIRRORRANK_LOG_LEVEL') ?? defaultConfig.logLevel,
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(toErrors(result.error.issues));
  }

  const parsed = result.data;
  return {
    ...parsed,
    timeoutSeconds: parsed.timeoutSeconds !== undefined && parsed.timeoutSeconds > 0 ? parsed.timeoutSeconds : undefined,
    probeCount: parsed.probeCount ?? parsed.number,
  };
};
