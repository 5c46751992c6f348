import type { ProbeFailureKind } from './types';

export class ProbeError extends Error {
  public url: string;
  public kind: ProbeFailureKind;

  constructor(url: string, kind: ProbeFailureKind, detail: string) {
    super(`probe of ${url} failed (${kind}): ${detail}`);
    this.name = 'ProbeError';
    this.url = url;
    this.kind = kind;
  }
}
