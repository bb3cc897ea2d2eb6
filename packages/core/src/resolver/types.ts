import { z } from 'zod';
import { InvalidInput } from '../errors.js';
import { stableHash } from '../determinism/index.js';

// ---------------------------------------------------------------------------
// Source candidates
// ---------------------------------------------------------------------------

export type SourceTier = 1 | 2 | 3;
export type AccessMethod = 'api' | 'scrape' | 'file';

export interface SourceCandidate {
  readonly providerId: string;
  /** 1 = highest trust, 3 = lowest. */
  readonly tier: SourceTier;
  /** Ordering within a tier, lower is preferred. */
  readonly priorityScore: number;
  readonly access: AccessMethod;
  readonly contentType: string;
  readonly url?: string;
  readonly title?: string;
  /** Provider-specific identifiers (accession number, file path, ...). */
  readonly attributes?: Readonly<Record<string, string>>;
}

const tierSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

const SourceCandidateSchema = z.object({
  providerId: z.string().min(1),
  tier: tierSchema,
  priorityScore: z.number().finite().min(0).max(100),
  access: z.enum(['api', 'scrape', 'file']),
  contentType: z.string().min(1),
  url: z.string().min(1).optional(),
  title: z.string().optional(),
  attributes: z.record(z.string(), z.string()).optional(),
}).strict();

export type SourceCandidateInput = z.input<typeof SourceCandidateSchema>;

/** Validate and freeze a candidate. Out-of-range tier or priority is rejected. */
export function createSourceCandidate(input: SourceCandidateInput): SourceCandidate {
  const parsed = SourceCandidateSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new InvalidInput(`Invalid source candidate: ${issues}`, 'candidate');
  }
  const candidate: SourceCandidate = {
    ...parsed.data,
    ...(parsed.data.attributes ? { attributes: Object.freeze({ ...parsed.data.attributes }) } : {}),
  };
  return Object.freeze(candidate);
}

export function isSourceTier(value: number): value is SourceTier {
  return value === 1 || value === 2 || value === 3;
}

// ---------------------------------------------------------------------------
// Companies and documents
// ---------------------------------------------------------------------------

export interface CompanyRef {
  name: string;
  ticker?: string;
  /** SEC central index key, zero padded to 10 digits. */
  cik?: string;
}

/** Filesystem- and key-safe slug of the company name. */
export function companySlug(company: CompanyRef): string {
  const slug = company.name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug || 'company';
}

export interface ResolvedDocument {
  readonly id: string;
  readonly candidate: SourceCandidate;
  readonly bytes: Uint8Array;
  /** SHA-256 hex of the bytes. */
  readonly contentHash: string;
  readonly byteLength: number;
  readonly retrievedAt: string;
}

export function createResolvedDocument(
  candidate: SourceCandidate,
  bytes: Uint8Array,
  retrievedAt: Date,
): ResolvedDocument {
  const contentHash = stableHash(bytes);
  return Object.freeze({
    id: `${candidate.providerId}:${contentHash.slice(0, 12)}`,
    candidate,
    bytes,
    contentHash,
    byteLength: bytes.byteLength,
    retrievedAt: retrievedAt.toISOString(),
  });
}

// ---------------------------------------------------------------------------
// Provider capability interface
// ---------------------------------------------------------------------------

export interface ReportProvider {
  readonly id: string;
  /** Disabled providers are skipped by search. Defaults to enabled. */
  readonly enabled?: boolean;
  search(company: CompanyRef, year: number, tier: SourceTier, signal: AbortSignal): Promise<SourceCandidate[]>;
  download(candidate: SourceCandidate, signal: AbortSignal): Promise<ResolvedDocument>;
}

export interface DownloadFailure {
  candidate: SourceCandidate;
  error: Error;
}

export interface Resolution {
  document: ResolvedDocument;
  /** Number of download attempts including the successful one. */
  attempts: number;
  failures: DownloadFailure[];
}
