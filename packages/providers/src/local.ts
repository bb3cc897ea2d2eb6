import { readdir, readFile, stat } from 'node:fs/promises';
import { join, extname } from 'node:path';
import {
  ProviderError,
  companySlug,
  createResolvedDocument,
  createSourceCandidate,
  toError,
  type CompanyRef,
  type ReportProvider,
  type ResolvedDocument,
  type SourceCandidate,
  type SourceTier,
} from '@esgrade/core';
import { applyPriorityOffset, contentTypeFor, type BaseProviderOptions, type ProviderContext } from './types.js';

export const LOCAL_PROVIDER_ID = 'local';

/** Lower is preferred. PDFs have no text extractor and are not offered. */
const EXTENSION_PRIORITY: Record<string, number> = {
  '.json': 5,
  '.html': 35,
  '.htm': 35,
  '.txt': 40,
  '.md': 40,
};

export interface LocalProviderOptions extends BaseProviderOptions {
  /** Directory holding `<company-slug>/<year>/` report folders. */
  root: string;
}

/** Report files already on disk, laid out as `<root>/<company-slug>/<year>/`. */
export class LocalReportProvider implements ReportProvider {
  readonly id = LOCAL_PROVIDER_ID;
  readonly enabled: boolean;

  constructor(
    private readonly context: ProviderContext,
    private readonly options: LocalProviderOptions,
  ) {
    this.enabled = options.enabled ?? true;
  }

  directoryFor(company: CompanyRef, year: number): string {
    return join(this.options.root, companySlug(company), String(year));
  }

  async search(company: CompanyRef, year: number, tier: SourceTier, _signal: AbortSignal): Promise<SourceCandidate[]> {
    const dir = this.directoryFor(company, year);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new ProviderError(`Cannot read ${dir}: ${toError(err).message}`, this.id, 'search', false, { cause: err });
    }

    const candidates: SourceCandidate[] = [];
    for (const name of [...names].sort()) {
      const priority = EXTENSION_PRIORITY[extname(name).toLowerCase()];
      if (priority === undefined) continue;

      const path = join(dir, name);
      const info = await stat(path);
      if (!info.isFile()) continue;

      candidates.push(createSourceCandidate({
        providerId: this.id,
        tier,
        priorityScore: applyPriorityOffset(priority, this.options.priorityOffset),
        access: 'file',
        contentType: contentTypeFor(name) ?? 'text/plain',
        title: name,
        attributes: { path },
      }));
    }
    return candidates;
  }

  async download(candidate: SourceCandidate, _signal: AbortSignal): Promise<ResolvedDocument> {
    const path = candidate.attributes?.path;
    if (!path) {
      throw new ProviderError('Local candidate has no path', this.id, 'download');
    }
    try {
      const bytes = new Uint8Array(await readFile(path));
      return createResolvedDocument(candidate, bytes, this.context.determinism.now());
    } catch (err) {
      throw new ProviderError(`Cannot read ${path}: ${toError(err).message}`, this.id, 'download', false, { cause: err });
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
