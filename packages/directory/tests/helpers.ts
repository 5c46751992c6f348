import type { Endpoint } from '../src';

export const NEVER_SYNCED = {
  url: 'https://never-synced.example.org/archlinux/',
  protocol: 'https',
  last_sync: null,
  completion_pct: 0.0,
  delay: null,
  score: null,
  active: true,
  country: 'United States',
  country_code: 'US',
  isos: true,
  ipv4: true,
  ipv6: false,
  details: 'https://status.example.org/mirrors/never-synced/1/',
};

export const SYNCED_MAY = {
  url: 'http://may.example.net/pub/linux/archlinux/',
  protocol: 'http',
  last_sync: '2024-05-01T14:25:08Z',
  completion_pct: 1.0,
  delay: 6354,
  score: 2.852143826997215,
  active: true,
  country: 'Greece',
  country_code: 'GR',
  isos: true,
  ipv4: true,
  ipv6: true,
  details: 'https://status.example.org/mirrors/may/2/',
};

export const SYNCED_APRIL = {
  url: 'https://april.example.com/pub/archlinux/',
  protocol: 'https',
  last_sync: '2024-04-01T08:22:54Z',
  completion_pct: 1.0,
  delay: 1863,
  score: 1.8639532316809715,
  active: true,
  country: 'Australia',
  country_code: 'AU',
  isos: true,
  ipv4: true,
  ipv6: true,
  details: 'https://status.example.org/mirrors/april/3/',
};

export const statusDocument = (...urls: unknown[]) => ({
  cutoff: 86400,
  last_check: '2024-05-04T10:00:00Z',
  num_checks: 5,
  urls,
});

export const makeEndpoint = (overrides: Partial<Endpoint> = {}): Endpoint => ({
  url: 'https://mirror.example.org/',
  protocol: 'https',
  details: '',
  ...overrides,
});
