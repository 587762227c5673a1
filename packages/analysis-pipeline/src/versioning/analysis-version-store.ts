import type { AnalysisVersion, NewAnalysisVersion } from '@legisight/model';

import { AnalysisError } from '../errors';

/**
 * Persistence contract for analysis versions
 *
 * The store assigns version numbers: 1 for a document's first version, then
 * one above the current version. Versions are never overwritten.
 */
export interface AnalysisVersionStore {
  /**
   * @throws AnalysisVersionConflictError when `previousVersion` is not the
   * document's current version
   */
  append(version: NewAnalysisVersion): Promise<AnalysisVersion>;

  getCurrent(documentId: string): Promise<AnalysisVersion | undefined>;

  /**
   * All versions of a document, oldest first
   */
  getHistory(documentId: string): Promise<AnalysisVersion[]>;
}

/**
 * An append named a predecessor that is no longer the current version
 */
export class AnalysisVersionConflictError extends AnalysisError {
  constructor(
    readonly documentId: string,
    readonly expectedVersion: number | null,
    readonly currentVersion: number | null,
  ) {
    super(
      `Version conflict for document ${documentId}: expected current version ${expectedVersion ?? 'none'}, found ${currentVersion ?? 'none'}`,
    );
    this.name = 'AnalysisVersionConflictError';
  }
}

export interface InMemoryAnalysisVersionStoreOptions {
  now?: () => Date;
}

/**
 * Reference AnalysisVersionStore kept in process memory
 *
 * Snapshots are deep-copied and frozen on append.
 */
export class InMemoryAnalysisVersionStore implements AnalysisVersionStore {
  private readonly versions = new Map<string, AnalysisVersion[]>();
  private readonly now: () => Date;

  constructor(options: InMemoryAnalysisVersionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async append(version: NewAnalysisVersion): Promise<AnalysisVersion> {
    const history = this.versions.get(version.documentId) ?? [];
    const current = history.at(-1)?.version ?? null;

    if (version.previousVersion !== current) {
      throw new AnalysisVersionConflictError(
        version.documentId,
        version.previousVersion,
        current,
      );
    }

    const snapshot = deepFreeze<AnalysisVersion>({
      documentId: version.documentId,
      version: (current ?? 0) + 1,
      fingerprint: version.fingerprint,
      previousVersion: current,
      createdAt: this.now().toISOString(),
      analysis: structuredClone(version.analysis),
      provenance: structuredClone(version.provenance),
    });

    this.versions.set(version.documentId, [...history, snapshot]);
    return snapshot;
  }

  async getCurrent(documentId: string): Promise<AnalysisVersion | undefined> {
    return this.versions.get(documentId)?.at(-1);
  }

  async getHistory(documentId: string): Promise<AnalysisVersion[]> {
    return [...(this.versions.get(documentId) ?? [])];
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
