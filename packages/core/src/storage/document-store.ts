import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { InvalidInput, StorageError } from '../errors.js';
import type { TextSpan } from '../extraction/types.js';

/**
 * Span storage keyed by organisation and reporting year. `put` merges by span
 * id; `list` returns spans sorted by id.
 */
export interface DocumentStore {
  put(orgKey: string, year: number, spans: readonly TextSpan[]): Promise<void>;
  list(orgKey: string, year: number): Promise<TextSpan[]>;
}

const ORG_KEY = /^[a-z0-9][a-z0-9-]*$/;

export function assertStoreKey(orgKey: string, year: number): void {
  if (!ORG_KEY.test(orgKey)) {
    throw new InvalidInput(`Invalid organisation key "${orgKey}"`, 'orgKey');
  }
  if (!Number.isInteger(year) || year < 1900 || year > 2200) {
    throw new InvalidInput(`Invalid year ${year}`, 'year');
  }
}

function mergeSpans(existing: readonly TextSpan[], incoming: readonly TextSpan[]): TextSpan[] {
  const byId = new Map<string, TextSpan>();
  for (const span of existing) byId.set(span.id, span);
  for (const span of incoming) byId.set(span.id, span);
  return [...byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

export class MemoryDocumentStore implements DocumentStore {
  private readonly entries = new Map<string, TextSpan[]>();

  async put(orgKey: string, year: number, spans: readonly TextSpan[]): Promise<void> {
    assertStoreKey(orgKey, year);
    const key = `${orgKey}/${year}`;
    this.entries.set(key, mergeSpans(this.entries.get(key) ?? [], spans));
  }

  async list(orgKey: string, year: number): Promise<TextSpan[]> {
    assertStoreKey(orgKey, year);
    return [...(this.entries.get(`${orgKey}/${year}`) ?? [])];
  }
}

// ---------------------------------------------------------------------------
// File store: <dataDir>/<orgKey>/<year>.json
// ---------------------------------------------------------------------------

const StoredSpanSchema = z.object({
  id: z.string().min(1),
  sourceId: z.string().min(1),
  text: z.string(),
  offset: z.number().int().min(0),
  page: z.number().int().min(1).optional(),
  publishedAt: z.string().optional(),
}).strict();

const StoredFileSchema = z.object({
  version: z.literal(1),
  orgKey: z.string(),
  year: z.number().int(),
  spans: z.array(StoredSpanSchema),
}).strict();

export class FileDocumentStore implements DocumentStore {
  constructor(private readonly dataDir: string) {}

  async put(orgKey: string, year: number, spans: readonly TextSpan[]): Promise<void> {
    const merged = mergeSpans(await this.list(orgKey, year), spans);
    const dir = join(this.dataDir, orgKey);
    await mkdir(dir, { recursive: true });

    const path = this.pathFor(orgKey, year);
    const tmp = `${path}.tmp`;
    const body = { version: 1, orgKey, year, spans: merged };
    await writeFile(tmp, JSON.stringify(body, null, 2), 'utf-8');
    await rename(tmp, path);
  }

  async list(orgKey: string, year: number): Promise<TextSpan[]> {
    assertStoreKey(orgKey, year);
    const path = this.pathFor(orgKey, year);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new StorageError(`Corrupt document store file: ${path}`, path);
    }

    const parsed = StoredFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new StorageError(`Invalid document store file ${path}: ${issues.join(', ')}`, path, issues);
    }
    return parsed.data.spans;
  }

  pathFor(orgKey: string, year: number): string {
    return join(this.dataDir, orgKey, `${year}.json`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
