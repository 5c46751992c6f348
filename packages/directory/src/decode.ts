import { z } from 'zod';
import { DirectoryDecodeError } from './errors';
import { PROTOCOLS } from './types';
import type { Directory, Endpoint } from './types';

const toErrors = (issues: z.ZodIssue[]): string[] => {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
    return `${path}: ${issue.message}`;
  });
};

const endpointSchema = z.object({
  url: z.string().min(1),
  protocol: z.enum(PROTOCOLS).default('https'),
  score: z.number().nullable().optional(),
  delay: z.number().nullable().optional(),
  country: z.string().nullable().optional(),
  country_code: z.string().nullable().optional(),
  last_sync: z.string().datetime({ offset: true }).nullable().optional(),
  isos: z.boolean().nullable().optional(),
  ipv4: z.boolean().nullable().optional(),
  ipv6: z.boolean().nullable().optional(),
  details: z.string().default(''),
});

// Other top-level fields (cutoff, last_check, ...) are ignored.
const statusSchema = z.object({
  urls: z.array(endpointSchema),
});

type RawEndpoint = z.infer<typeof endpointSchema>;

const toEndpoint = (raw: RawEndpoint): Endpoint => ({
  url: raw.url,
  protocol: raw.protocol,
  score: raw.score ?? undefined,
  delay: raw.delay ?? undefined,
  country: raw.country ?? undefined,
  countryCode: raw.country_code ?? undefined,
  lastSyncMs: raw.last_sync ? Date.parse(raw.last_sync) : undefined,
  isos: raw.isos ?? undefined,
  ipv4: raw.ipv4 ?? undefined,
  ipv6: raw.ipv6 ?? undefined,
  details: raw.details,
});

/** Validate an already-parsed status document and build a Directory from it. */
export const decodeDirectory = (payload: unknown, source?: string): Directory => {
  const result = statusSchema.safeParse(payload);
  if (!result.success) {
    throw new DirectoryDecodeError(toErrors(result.error.issues), source);
  }
  return {
    endpoints: result.data.urls.map(toEndpoint),
    source,
  };
};

/** Parse JSON text and decode it. Throws DirectoryDecodeError on any failure. */
export const parseDirectoryJson = (text: string, source?: string): Directory => {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DirectoryDecodeError([`invalid-json: ${message}`], source);
  }
  return decodeDirectory(payload, source);
};
