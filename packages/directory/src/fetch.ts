import { fetch } from 'undici';
import { parseDirectoryJson } from './decode';
import { DEFAULT_FETCH_TIMEOUT_MS } from './defaults';
import { DirectoryFetchError } from './errors';
import { withTimeout } from './utils';
import type { Directory, DirectoryFetcher, FetchDirectoryOptions } from './types';

/** Default HTTP fetcher used when no override is provided. */
const defaultFetcher: DirectoryFetcher = async (url, signal) => {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new DirectoryFetchError(url, `unexpected status ${response.status}`, response.status);
  }
  return response.text();
};

/** Download the status document at `url` and decode it. The directory's source is the URL. */
export const fetchDirectory = async (url: string, options: FetchDirectoryOptions = {}): Promise<Directory> => {
  const fetcher = options.fetcher ?? defaultFetcher;
  const timeout = withTimeout(options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS, options.signal);

  let body: string;
  try {
    body = await fetcher(url, timeout.signal);
  } catch (error) {
    if (error instanceof DirectoryFetchError) {
      throw error;
    }
    if (timeout.timedOut()) {
      throw new DirectoryFetchError(url, 'timed out');
    }
    throw new DirectoryFetchError(url, error instanceof Error ? error.message : String(error));
  } finally {
    timeout.cancel();
  }

  return parseDirectoryJson(body, url);
};
