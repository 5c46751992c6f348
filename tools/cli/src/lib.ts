export const usage = (): string => {
  return `mirrorrank <command>

Commands:
  mirrorlist [--url <url> | --file <path>] [--sort age|rate|country|score|delay] [--number <n>]
    [--age <hours>] [--isos] [--ipv4] [--ipv6] [--protocol <ftp|http|https|rsync,...>]
    [--timeout <seconds>] [--probe-count <n>] [--save <file>] [--verbose]
  countries [--url <url> | --file <path>] [--verbose]

Environment:
  MIRRORRANK_URL, MIRRORRANK_SORT, MIRRORRANK_NUMBER, MIRRORRANK_AGE, MIRRORRANK_PROTOCOLS,
  MIRRORRANK_TIMEOUT, MIRRORRANK_PROBE_COUNT, MIRRORRANK_LOG_LEVEL
`;
};

export const parseArgs = (args: string[]): Record<string, string> => {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const key = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      result[key] = 'true';
    } else {
      result[key] = value;
      i += 1;
    }
  }
  return result;
};

/** Split comma-separated values into trimmed, non-empty items. */
export const parseList = (value?: string): string[] | undefined => {
  return value
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};
