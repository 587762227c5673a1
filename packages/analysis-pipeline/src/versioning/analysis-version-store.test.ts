import { describe, expect, test } from 'vitest';

import {
  createProvenance,
  createStructuredAnalysis,
} from '../testing/analysis-fixtures';
import {
  AnalysisVersionConflictError,
  InMemoryAnalysisVersionStore,
} from './analysis-version-store';

function createStore() {
  let tick = 0;
  return new InMemoryAnalysisVersionStore({
    now: () => new Date(Date.UTC(2026, 0, 15, 10, 0, tick++)),
  });
}

function newVersion(previousVersion: number | null, fingerprint = 'fp-1') {
  return {
    documentId: 'doc-1',
    fingerprint,
    previousVersion,
    analysis: createStructuredAnalysis(),
    provenance: createProvenance({ fingerprint }),
  };
}

describe('InMemoryAnalysisVersionStore', () => {
  test('numbers versions from 1 and links predecessors', async () => {
    const store = createStore();

    const first = await store.append(newVersion(null));
    const second = await store.append(newVersion(1, 'fp-2'));

    expect(first).toMatchObject({
      version: 1,
      previousVersion: null,
      createdAt: '2026-01-15T10:00:00.000Z',
    });
    expect(second).toMatchObject({
      version: 2,
      previousVersion: 1,
      fingerprint: 'fp-2',
      createdAt: '2026-01-15T10:00:01.000Z',
    });
  });

  test('keeps every version and reports the highest as current', async () => {
    const store = createStore();
    await store.append(newVersion(null));
    await store.append(newVersion(1, 'fp-2'));
    await store.append(newVersion(2, 'fp-3'));

    const history = await store.getHistory('doc-1');

    expect(history.map((v) => v.version)).toEqual([1, 2, 3]);
    expect((await store.getCurrent('doc-1'))?.fingerprint).toBe('fp-3');
  });

  test('keeps documents apart', async () => {
    const store = createStore();
    await store.append(newVersion(null));

    await expect(store.getCurrent('doc-2')).resolves.toBeUndefined();
    await expect(store.getHistory('doc-2')).resolves.toEqual([]);
  });

  test('rejects an append whose predecessor is not current', async () => {
    const store = createStore();
    await store.append(newVersion(null));
    await store.append(newVersion(1, 'fp-2'));

    const promise = store.append(newVersion(1, 'fp-3'));

    await expect(promise).rejects.toBeInstanceOf(AnalysisVersionConflictError);
    await expect(promise).rejects.toThrow(
      'Version conflict for document doc-1: expected current version 1, found 2',
    );
    expect(await store.getHistory('doc-1')).toHaveLength(2);
  });

  test('stores frozen copies', async () => {
    const store = createStore();
    const input = newVersion(null);

    const stored = await store.append(input);
    input.analysis.summary = 'changed after append';

    expect(stored.analysis.summary).toBe('Creates a county health district.');
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.analysis.keyPoints)).toBe(true);
    expect(() => {
      stored.analysis.keyPoints.push({ point: 'x', impactType: 'neutral' });
    }).toThrow(TypeError);
  });

  test('returns history copies callers cannot use to rewrite it', async () => {
    const store = createStore();
    await store.append(newVersion(null));

    const history = await store.getHistory('doc-1');
    history.pop();

    expect(await store.getHistory('doc-1')).toHaveLength(1);
  });
});
