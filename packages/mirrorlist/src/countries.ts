import type { Directory } from '@mirrorrank/directory';
import type { CountryCount } from './types';

const HEADER_LABEL = 'Country';

const charLength = (value: string): number => Array.from(value).length;

const compareStrings = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

/** Count endpoints per (country, code) pair, skipping endpoints missing either. Sorted by country then code. */
export const countCountries = (directory: Directory): CountryCount[] => {
  const counts = new Map<string, CountryCount>();
  for (const endpoint of directory.endpoints) {
    if (endpoint.country === undefined || endpoint.countryCode === undefined) {
      continue;
    }
    const key = JSON.stringify([endpoint.country, endpoint.countryCode]);
    const existing = counts.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      counts.set(key, { country: endpoint.country, code: endpoint.countryCode, count: 1 });
    }
  }
  return Array.from(counts.values()).sort(
    (a, b) => compareStrings(a.country, b.country) || compareStrings(a.code, b.code),
  );
};

const countryLine = (entry: CountryCount, width: number): string => {
  const padding = ' '.repeat(Math.max(0, width - charLength(entry.country)));
  return `${entry.country}${padding} ${entry.code.padStart(4)} ${String(entry.count).padStart(4)}`;
};

/** Tabular report of where mirrors are; entries with an empty country name are left out. */
export const renderCountryReport = (directory: Directory): string => {
  const entries = countCountries(directory).filter((entry) => entry.country.length > 0);
  const width = Math.max(HEADER_LABEL.length, ...entries.map((entry) => charLength(entry.country)));
  const lines = [
    `${HEADER_LABEL}${' '.repeat(width - HEADER_LABEL.length)} Code Count`,
    `${'-'.repeat(width)} ---- ----`,
    ...entries.map((entry) => countryLine(entry, width)),
  ];
  return lines.join('\n');
};
