import type { LoggerMethods } from '@legisight/logger';
import type { AnalysisContent } from '@legisight/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { AnalysisPipeline, type AnalysisPipelineOptions } from './analysis-pipeline';
import {
  AnalysisAbortedError,
  ChunkedAnalysisError,
  ConfigurationError,
  ModelCallError,
} from './errors';
import { INSUFFICIENT_TEXT_FOR_ANALYSIS } from './schemas/structured-analysis-schema';
import { createAnalysisContent } from './testing/analysis-fixtures';
import {
  FakeModelClient,
  type FakeResponder,
  createDeferred,
} from './testing/fake-model-client';
import { WordTokenCounter } from './testing/word-token-counter';
import { InMemoryAnalysisVersionStore } from './versioning/analysis-version-store';

const { mockGenerateObject } = vi.hoisted(() => ({
  mockGenerateObject: vi.fn(),
}));

vi.mock('ai', async (importOriginal) => ({
  ...(await importOriginal<typeof import('ai')>()),
  generateObject: mockGenerateObject,
}));

/**
 * `count` paragraphs of 100 words each
 */
function paragraphs(count: number): string {
  return Array.from({ length: count }, (_, p) =>
    Array.from({ length: 100 }, (_, w) => `p${p}w${w}`).join(' '),
  ).join('\n\n');
}

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

const metadata = { documentId: 'doc-1', identifier: 'HB 42' };
const pdfBytes = new TextEncoder().encode('%PDF-1.7\nbinary');

describe('AnalysisPipeline', () => {
  let logger: LoggerMethods;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  function createPipeline(
    responder?: FakeResponder,
    overrides: Partial<AnalysisPipelineOptions> = {},
  ) {
    const client = new FakeModelClient(responder);
    const pipeline = new AnalysisPipeline({
      logger,
      model: 'openai/gpt-4o',
      client,
      tokenCounter: new WordTokenCounter(),
      synthesizeSummary: false,
      maxContextTokens: 5_000,
      chunkTokenBudget: 2_000,
      ...overrides,
    });
    return { client, pipeline };
  }

  describe('configuration', () => {
    test('rejects invalid options', () => {
      expect(() => createPipeline(undefined, { maxConcurrentCalls: 0 })).toThrow(
        ConfigurationError,
      );
    });

    test('rejects an unknown schema version', () => {
      expect(() => createPipeline(undefined, { schemaVersion: '1999-01' })).toThrow(
        'Unknown analysis schema version "1999-01"',
      );
    });

    test('derives limits from the model profile', () => {
      const pipeline = new AnalysisPipeline({
        logger,
        model: 'openai/gpt-4o',
      });

      expect(pipeline.getConfig()).toMatchObject({
        maxContextTokens: 108_000,
        chunkTokenBudget: 88_000,
        minAnalyzableTokens: 300,
      });
    });
  });

  describe('insufficient text', () => {
    test.each([0, 50, 299])(
      'returns the insufficient-text outcome for %i tokens without a model call',
      async (count) => {
        const { client, pipeline } = createPipeline();

        const outcome = await pipeline.analyze({
          content: words(count),
          metadata,
        });

        expect(client.calls).toHaveLength(0);
        expect(outcome.status).toBe('insufficient_text');
        expect(outcome.analysis.insufficientText).toBe(true);
        expect(outcome.analysis.modelId).toBe('none');
        expect(outcome.analysis.confidence).toBe(0);
        expect(outcome.provenance).toMatchObject({
          route: 'insufficient_text',
          tokenCount: count,
        });
      },
    );

    test('serves a repeated insufficient-text request from the cache', async () => {
      const { client, pipeline } = createPipeline();

      await pipeline.analyze({ content: words(10), metadata });
      const repeat = await pipeline.analyze({ content: words(10), metadata });

      expect(repeat.cacheHit).toBe(true);
      expect(repeat.status).toBe('insufficient_text');
      expect(client.calls).toHaveLength(0);
      expect(pipeline.getCacheStats()).toMatchObject({
        hits: 1,
        computations: 1,
      });
    });

    test('marks a model-declared insufficient response', async () => {
      const { pipeline } = createPipeline(() =>
        createAnalysisContent({ summary: INSUFFICIENT_TEXT_FOR_ANALYSIS }),
      );

      const outcome = await pipeline.analyze({ content: words(400), metadata });

      expect(outcome.status).toBe('insufficient_text');
      expect(outcome.provenance.route).toBe('direct');
      expect(outcome.analysis.insufficientText).toBe(true);
      expect(outcome.analysis.summary).toBe(
        'Insufficient text available for detailed analysis.',
      );
      expect(outcome.analysis.modelId).toBe('gpt-4o');
    });
  });

  describe('routing', () => {
    test('takes the direct path at exactly the context limit', async () => {
      const { client, pipeline } = createPipeline();

      const outcome = await pipeline.analyze({
        content: paragraphs(50),
        metadata,
      });

      expect(client.calls).toHaveLength(1);
      expect(client.calls[0].options.phase).toBe('direct');
      expect(client.calls[0].prompt.userPrompt).toContain('BILL CONTEXT:');
      expect(outcome.status).toBe('done');
      expect(outcome.provenance).toMatchObject({
        route: 'direct',
        tokenCount: 5_000,
        modelId: 'gpt-4o',
        schemaVersion: '2025-01',
      });
      expect(outcome.analysis).toMatchObject({
        summary: 'Creates a county health district.',
        schemaVersion: '2025-01',
        modelId: 'gpt-4o',
        insufficientText: false,
      });
      expect(outcome.cacheHit).toBe(false);
    });

    test('takes the chunked path one token over the limit', async () => {
      const { client, pipeline } = createPipeline();

      const outcome = await pipeline.analyze({
        content: `${paragraphs(50)} extra`,
        metadata,
      });

      expect(outcome.provenance.route).toBe('chunked');
      expect(outcome.provenance.tokenCount).toBe(5_001);
      expect(client.calls.every((call) => call.options.phase === 'chunk')).toBe(
        true,
      );
    });

    test('sends PDF content through the vision path', async () => {
      const { client, pipeline } = createPipeline();

      const outcome = await pipeline.analyze({
        content: pdfBytes,
        metadata,
        filename: 'hb42.pdf',
      });

      expect(client.calls).toHaveLength(1);
      expect(client.calls[0].content).toEqual({
        kind: 'pdf',
        data: pdfBytes,
        filename: 'hb42.pdf',
      });
      expect(client.calls[0].options.phase).toBe('vision');
      expect(outcome.provenance.route).toBe('vision');
      expect(outcome.provenance.tokenCount).toBeUndefined();
    });

    test('rejects PDF content for a model without vision', async () => {
      const client = new FakeModelClient(undefined, 'gpt-4', false);
      const pipeline = new AnalysisPipeline({
        logger,
        model: 'openai/gpt-4',
        client,
        tokenCounter: new WordTokenCounter(),
      });

      await expect(
        pipeline.analyze({ content: pdfBytes, metadata }),
      ).rejects.toThrow(
        'Model "gpt-4" cannot analyze PDF content: vision support is required',
      );
      expect(client.calls).toHaveLength(0);
    });
  });

  describe('chunked analysis', () => {
    test('reports a dropped chunk and still completes', async () => {
      const { pipeline } = createPipeline(({ options }) => {
        if (options.chunkIndex === 2) {
          throw new ModelCallError('Bad request', 400);
        }
        return createAnalysisContent({
          summary: `Part ${options.chunkIndex} summary.`,
        });
      });

      const outcome = await pipeline.analyze({
        content: paragraphs(100),
        metadata,
      });

      expect(outcome.status).toBe('done');
      expect(outcome.provenance).toMatchObject({
        route: 'chunked',
        tokenCount: 10_000,
        chunkCount: 5,
        contributingChunks: [0, 1, 3, 4],
        droppedChunks: [2],
        hasStructure: false,
      });
      expect(outcome.warnings.map((warning) => warning.code)).toEqual([
        'partial_coverage',
      ]);
      expect(outcome.analysis.summary).toBe(
        'Part 0 summary. Part 1 summary. Part 3 summary. Part 4 summary.',
      );
    });

    test('fails when every chunk fails and does not cache the failure', async () => {
      const { pipeline } = createPipeline(() => {
        throw new ModelCallError('Unauthorized', 401);
      });

      await expect(
        pipeline.analyze({ content: paragraphs(100), metadata }),
      ).rejects.toBeInstanceOf(ChunkedAnalysisError);
      expect(pipeline.getCacheStats()).toMatchObject({ failures: 1, size: 0 });
      expect(logger.error).toHaveBeenCalledWith(
        expect.stringMatching(/^\[AnalysisPipeline\] Analysis of document doc-1 failed: All 5 chunk\(s\) failed/),
      );
    });

    test('reports chunk counts to the telemetry sink', async () => {
      const recordChunkedAnalysis = vi.fn();
      const { pipeline } = createPipeline(undefined, {
        telemetry: { record: vi.fn(), recordChunkedAnalysis },
      });

      await pipeline.analyze({ content: paragraphs(100), metadata });

      expect(recordChunkedAnalysis).toHaveBeenCalledWith(
        expect.objectContaining({
          documentId: 'doc-1',
          chunkCount: 5,
          contributingChunks: 5,
          droppedChunks: 0,
        }),
      );
    });

    test('condenses summaries when synthesis is enabled', async () => {
      const synthesize = vi.fn().mockResolvedValue('Whole bill summary.');
      const { pipeline } = createPipeline(undefined, {
        synthesizeSummary: true,
        synthesizer: { synthesize },
      });

      const outcome = await pipeline.analyze({
        content: paragraphs(100),
        metadata,
      });

      expect(synthesize).toHaveBeenCalledTimes(1);
      expect(outcome.analysis.summary).toBe('Whole bill summary.');
    });
  });

  describe('caching', () => {
    test('runs one computation for concurrent identical requests', async () => {
      const pending = createDeferred<AnalysisContent>();
      const { client, pipeline } = createPipeline(() => pending.promise);

      const first = pipeline.analyze({ content: words(400), metadata });
      const second = pipeline.analyze({ content: words(400), metadata });
      pending.resolve(createAnalysisContent());
      const [a, b] = await Promise.all([first, second]);

      expect(client.calls).toHaveLength(1);
      expect(JSON.stringify(a.analysis)).toBe(JSON.stringify(b.analysis));
      expect([a.cacheHit, b.cacheHit]).toEqual([false, true]);
    });

    test('shares a cache entry between text and equivalent UTF-8 bytes', async () => {
      const { client, pipeline } = createPipeline();
      const text = `${words(400)}\r\n`;

      await pipeline.analyze({ content: text, metadata });
      const fromBytes = await pipeline.analyze({
        content: new TextEncoder().encode(text.replace('\r\n', '\n')),
        metadata,
      });

      expect(fromBytes.cacheHit).toBe(true);
      expect(client.calls).toHaveLength(1);
    });

    test('returns copies callers cannot use to change the cache', async () => {
      const { pipeline } = createPipeline();

      const first = await pipeline.analyze({ content: words(400), metadata });
      first.analysis.summary = 'edited';
      const second = await pipeline.analyze({ content: words(400), metadata });

      expect(second.analysis.summary).toBe('Creates a county health district.');
    });
  });

  describe('cancellation', () => {
    test('rejects an already cancelled request without a model call', async () => {
      const { client, pipeline } = createPipeline();
      const controller = new AbortController();
      controller.abort();

      const promise = pipeline.analyze({
        content: words(400),
        metadata,
        abortSignal: controller.signal,
      });

      await expect(promise).rejects.toBeInstanceOf(AnalysisAbortedError);
      await expect(promise).rejects.toMatchObject({ reason: 'cancelled' });
      expect(client.calls).toHaveLength(0);
    });

    test('passes the request signal to model calls', async () => {
      const { client, pipeline } = createPipeline();
      const controller = new AbortController();

      await pipeline.analyze({
        content: words(400),
        metadata,
        abortSignal: controller.signal,
      });

      expect(client.calls[0].options.abortSignal).toBe(controller.signal);
    });

    test('combines the caller signal with a deadline', async () => {
      const { client, pipeline } = createPipeline(undefined, {
        deadlineMs: 60_000,
      });
      const controller = new AbortController();

      await pipeline.analyze({
        content: words(400),
        metadata,
        abortSignal: controller.signal,
      });
      const signal = client.calls[0].options.abortSignal;
      controller.abort();

      expect(signal).not.toBe(controller.signal);
      expect(signal?.aborted).toBe(true);
    });
  });

  describe('analyzeAndRecord', () => {
    test('appends versions and skips unchanged content', async () => {
      const { pipeline } = createPipeline();
      const store = new InMemoryAnalysisVersionStore();
      const request = { content: words(400), metadata };

      const first = await pipeline.analyzeAndRecord(request, store);
      const unchanged = await pipeline.analyzeAndRecord(
        request,
        store,
        first.version,
      );
      const forced = await pipeline.analyzeAndRecord(
        request,
        store,
        first.version,
        { force: true },
      );

      expect(first).toMatchObject({ appended: true });
      expect(first.version).toMatchObject({
        documentId: 'doc-1',
        version: 1,
        previousVersion: null,
        fingerprint: first.outcome.provenance.fingerprint,
      });
      expect(unchanged.appended).toBe(false);
      expect(unchanged.version).toBe(first.version);
      expect(forced.version).toMatchObject({ version: 2, previousVersion: 1 });
      expect((await store.getHistory('doc-1')).map((v) => v.version)).toEqual([
        1, 2,
      ]);
    });

    test('appends a new version when the content changed', async () => {
      const { pipeline } = createPipeline();
      const store = new InMemoryAnalysisVersionStore();

      const first = await pipeline.analyzeAndRecord(
        { content: words(400), metadata },
        store,
      );
      const second = await pipeline.analyzeAndRecord(
        { content: words(401), metadata },
        store,
        first.version,
      );

      expect(second.appended).toBe(true);
      expect(second.version.previousVersion).toBe(1);
      expect(second.version.fingerprint).not.toBe(first.version.fingerprint);
    });
  });

  describe('token usage', () => {
    test('reports usage of the built-in model client', async () => {
      mockGenerateObject.mockResolvedValueOnce({
        object: createAnalysisContent(),
        usage: { inputTokens: 900, outputTokens: 200, totalTokens: 1100 },
      });
      const pipeline = new AnalysisPipeline({
        logger,
        model: 'openai/gpt-4o',
        tokenCounter: new WordTokenCounter(),
      });

      const outcome = await pipeline.analyze({ content: words(400), metadata });
      const report = pipeline.getTokenUsageReport();

      expect(outcome.provenance.route).toBe('direct');
      expect(report.total).toEqual({
        inputTokens: 900,
        outputTokens: 200,
        totalTokens: 1100,
      });
      expect(report.components.map((c) => c.component)).toEqual([
        'ModelClient',
      ]);
      expect(report.components[0].phases[0].phase).toBe('direct');
    });
  });
});
