import { truncateDirectory } from '@mirrorrank/directory';
import type { Directory, Endpoint } from '@mirrorrank/directory';
import type { MirrorlistOptions } from './types';

export const MIRRORLIST_BANNER = '# Mirror list generated by mirrorrank';

const preamble = (directory: Directory, generatedAt?: Date): string[] => {
  const lines = [MIRRORLIST_BANNER, '#'];
  if (directory.source) {
    lines.push(`# from: \t${directory.source}`);
  }
  if (generatedAt) {
    lines.push(`# when: \t${generatedAt.toISOString()}`);
  }
  return lines;
};

export const serverLine = (endpoint: Endpoint): string => `Server = ${endpoint.url}$repo/os/$arch`;

/** Render the mirror-list file: header, blank line, then one Server line per endpoint in order. */
export const renderMirrorlist = (directory: Directory, options: MirrorlistOptions = {}): string => {
  const selected = options.limit === undefined ? directory : truncateDirectory(directory, options.limit);
  return [...preamble(directory, options.generatedAt), '', ...selected.endpoints.map(serverLine)].join('\n');
};
