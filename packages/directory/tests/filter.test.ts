import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ageInHours, decodeDirectory, endpointAgeMs, filterDirectory } from '../src';
import type { Directory, Endpoint, Protocol } from '../src';
import { makeEndpoint, NEVER_SYNCED, SYNCED_APRIL, SYNCED_MAY, statusDocument } from './helpers';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);

const baseDirectory = (): Directory => decodeDirectory(statusDocument(NEVER_SYNCED, SYNCED_MAY, SYNCED_APRIL));

// one endpoint synced ten minutes in the future, then one per hour going back 19 hours
const withRecentSyncs = (): Directory => {
  const base = baseDirectory();
  const recent: Endpoint[] = [];
  for (let h = 0; h < 20; h += 1) {
    recent.push(makeEndpoint({ url: `https://recent-${h}.example.org/`, lastSyncMs: NOW + 10 * MINUTE - h * HOUR }));
  }
  return { ...base, endpoints: [...base.endpoints, ...recent] };
};

test('no criteria keeps every endpoint in order', () => {
  const directory = withRecentSyncs();
  const filtered = filterDirectory(directory, {}, NOW);
  assert.equal(filtered.endpoints.length, directory.endpoints.length);
  filtered.endpoints.forEach((endpoint, index) => assert.equal(endpoint, directory.endpoints[index]));
  assert.notEqual(filtered.endpoints, directory.endpoints);
});

test('age is undefined without a last sync', () => {
  const [never, may] = baseDirectory().endpoints;
  assert.equal(endpointAgeMs(never, NOW), undefined);
  assert.equal(endpointAgeMs(may, Date.UTC(2024, 4, 1, 15, 25, 8)), HOUR);
});

test('ageInHours adds the minutes component to whole hours', () => {
  assert.equal(ageInHours(90 * MINUTE), 1.5);
  assert.equal(ageInHours(5 * HOUR + 30 * MINUTE + 59_000), 5.5);
  assert.equal(ageInHours(-10 * MINUTE), -10 / 60);
});

test('a 0.7 hour cutoff keeps only the endpoint synced in the future', () => {
  const filtered = filterDirectory(withRecentSyncs(), { maxAgeHours: 0.7 }, NOW);
  assert.deepEqual(
    filtered.endpoints.map((endpoint) => endpoint.url),
    ['https://recent-0.example.org/'],
  );
});

test('shrinking cutoffs never grow the directory', () => {
  let directory = withRecentSyncs();
  assert.equal(directory.endpoints.length, 23);
  let size = directory.endpoints.length;
  for (let step = 29; step >= 0; step -= 1) {
    directory = filterDirectory(directory, { maxAgeHours: step * 0.7 }, NOW);
    assert.ok(directory.endpoints.length <= size);
    size = directory.endpoints.length;
  }
  assert.equal(size, 1);
});

test('an age cutoff drops endpoints that never synced', () => {
  const filtered = filterDirectory(baseDirectory(), { maxAgeHours: 1_000_000 }, NOW);
  assert.deepEqual(
    filtered.endpoints.map((endpoint) => endpoint.url),
    [SYNCED_MAY.url, SYNCED_APRIL.url],
  );
});

const flagCombinations = (): Endpoint[] => {
  const values = [undefined, true, false];
  const endpoints: Endpoint[] = [];
  for (const isos of values) {
    for (const ipv4 of values) {
      for (const ipv6 of values) {
        endpoints.push(
          makeEndpoint({ url: `https://${String(isos)}-${String(ipv4)}-${String(ipv6)}.example.org/`, isos, ipv4, ipv6 }),
        );
      }
    }
  }
  return endpoints;
};

test('capability flags treat absent as false', () => {
  const directory: Directory = { endpoints: flagCombinations() };

  const isos = filterDirectory(directory, { isos: true }, NOW);
  assert.equal(isos.endpoints.length, 9);
  assert.ok(isos.endpoints.every((endpoint) => endpoint.isos === true));

  const ipv4 = filterDirectory(directory, { ipv4: true }, NOW);
  assert.equal(ipv4.endpoints.length, 9);
  assert.ok(ipv4.endpoints.every((endpoint) => endpoint.ipv4 === true));

  const ipv6 = filterDirectory(directory, { ipv6: true }, NOW);
  assert.equal(ipv6.endpoints.length, 9);
  assert.ok(ipv6.endpoints.every((endpoint) => endpoint.ipv6 === true));

  const all = filterDirectory(directory, { isos: true, ipv4: true, ipv6: true }, NOW);
  assert.deepEqual(
    all.endpoints.map((endpoint) => endpoint.url),
    ['https://true-true-true.example.org/'],
  );
});

test('false capability requirements do not filter', () => {
  const directory: Directory = { endpoints: flagCombinations() };
  const filtered = filterDirectory(directory, { isos: false, ipv4: false, ipv6: false }, NOW);
  assert.equal(filtered.endpoints.length, 27);
});

test('protocol allow-list keeps listed protocols only', () => {
  const protocols: Protocol[] = ['ftp', 'https', 'http', 'rsync'];
  const directory: Directory = {
    endpoints: protocols.map((protocol) => makeEndpoint({ url: `${protocol}://mirror.example.org/`, protocol })),
  };

  const secure = filterDirectory(directory, { protocols: ['rsync', 'https'] }, NOW);
  assert.deepEqual(
    secure.endpoints.map((endpoint) => endpoint.protocol),
    ['https', 'rsync'],
  );

  const unrestricted = filterDirectory(directory, { protocols: [] }, NOW);
  assert.equal(unrestricted.endpoints.length, 4);
});

test('criteria combine with logical and', () => {
  const directory: Directory = {
    endpoints: [
      makeEndpoint({ url: 'https://a.example.org/', protocol: 'http', ipv6: true, lastSyncMs: NOW - HOUR }),
      makeEndpoint({ url: 'https://b.example.org/', protocol: 'https', ipv6: true, lastSyncMs: NOW - HOUR }),
      makeEndpoint({ url: 'https://c.example.org/', protocol: 'https', ipv6: false, lastSyncMs: NOW - HOUR }),
      makeEndpoint({ url: 'https://d.example.org/', protocol: 'https', ipv6: true, lastSyncMs: NOW - 5 * HOUR }),
    ],
    source: 'combined',
  };
  const filtered = filterDirectory(directory, { maxAgeHours: 2, ipv6: true, protocols: ['https'] }, NOW);
  assert.equal(filtered.source, 'combined');
  assert.deepEqual(
    filtered.endpoints.map((endpoint) => endpoint.url),
    ['https://b.example.org/'],
  );
});
