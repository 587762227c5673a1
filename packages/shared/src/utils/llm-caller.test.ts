import { beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';

import { LLMCallFailedError, LLMCaller } from './llm-caller';
import { ModelCallLimiter } from './model-call-limiter';
import { RetryPolicy } from './retry-policy';

const { mockGenerateObject } = vi.hoisted(() => ({
  mockGenerateObject: vi.fn(),
}));

vi.mock('ai', () => ({
  generateObject: mockGenerateObject,
}));

const schema = z.object({ result: z.string() });

function response(
  result: string,
  usage = { inputTokens: 100, outputTokens: 50, totalTokens: 150 },
) {
  return { object: { result }, usage };
}

function createPolicy(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({
    maxAttempts,
    baseDelayMs: 1,
    sleep: async () => {},
  });
}

function baseConfig() {
  return {
    schema,
    systemPrompt: 'You are a test analyst',
    userPrompt: 'Analyze this',
    primaryModel: 'openai/gpt-4o',
    retryPolicy: createPolicy(),
    component: 'TestComponent',
    phase: 'direct',
  };
}

describe('LLMCaller', () => {
  beforeEach(() => {
    mockGenerateObject.mockReset();
  });

  describe('call', () => {
    test('returns parsed output and usage from the primary model', async () => {
      mockGenerateObject.mockResolvedValueOnce(response('ok'));

      const result = await LLMCaller.call(baseConfig());

      expect(result.output).toEqual({ result: 'ok' });
      expect(result.usedFallback).toBe(false);
      expect(result.attempts).toBe(1);
      expect(result.provider).toBe('openai');
      expect(result.usage).toEqual({
        component: 'TestComponent',
        phase: 'direct',
        model: 'primary',
        modelName: 'gpt-4o',
        inputTokens: 100,
        outputTokens: 50,
        totalTokens: 150,
      });
    });

    test('passes prompts and disables SDK-level retries', async () => {
      mockGenerateObject.mockResolvedValueOnce(response('ok'));

      await LLMCaller.call({
        ...baseConfig(),
        schemaName: 'Analysis',
        temperature: 0,
      });

      expect(mockGenerateObject).toHaveBeenCalledWith(
        expect.objectContaining({
          model: 'openai/gpt-4o',
          schema,
          schemaName: 'Analysis',
          system: 'You are a test analyst',
          prompt: 'Analyze this',
          temperature: 0,
          maxRetries: 0,
        }),
      );
    });

    test('defaults missing usage fields to zero', async () => {
      mockGenerateObject.mockResolvedValueOnce({
        object: { result: 'ok' },
        usage: {
          inputTokens: undefined,
          outputTokens: undefined,
          totalTokens: undefined,
        },
      });

      const result = await LLMCaller.call(baseConfig());

      expect(result.usage.inputTokens).toBe(0);
      expect(result.usage.outputTokens).toBe(0);
      expect(result.usage.totalTokens).toBe(0);
    });

    test('retries the primary model before succeeding', async () => {
      mockGenerateObject
        .mockRejectedValueOnce(new Error('timeout'))
        .mockResolvedValueOnce(response('second'));
      const onRetry = vi.fn();

      const result = await LLMCaller.call({ ...baseConfig(), onRetry });

      expect(result.output).toEqual({ result: 'second' });
      expect(result.attempts).toBe(2);
      expect(onRetry).toHaveBeenCalledWith(
        expect.objectContaining({
          attempt: 1,
          delayMs: 1,
          modelName: 'gpt-4o',
          role: 'primary',
        }),
      );
    });

    test('falls back after the primary model exhausts its attempts', async () => {
      mockGenerateObject
        .mockRejectedValueOnce(new Error('overloaded'))
        .mockRejectedValueOnce(new Error('overloaded'))
        .mockResolvedValueOnce(
          response('fallback', {
            inputTokens: 80,
            outputTokens: 20,
            totalTokens: 100,
          }),
        );

      const result = await LLMCaller.call({
        ...baseConfig(),
        retryPolicy: createPolicy(2),
        fallbackModel: 'anthropic/claude-sonnet-4',
      });

      expect(result.usedFallback).toBe(true);
      expect(result.attempts).toBe(3);
      expect(result.provider).toBe('anthropic');
      expect(result.usage.model).toBe('fallback');
      expect(result.usage.modelName).toBe('claude-sonnet-4');
      expect(result.usage.totalTokens).toBe(100);
    });

    test('throws LLMCallFailedError with the last cause when no fallback exists', async () => {
      const failure = new Error('still failing');
      mockGenerateObject.mockRejectedValue(failure);

      const promise = LLMCaller.call(baseConfig());

      await expect(promise).rejects.toBeInstanceOf(LLMCallFailedError);
      await expect(promise).rejects.toMatchObject({
        attempts: 3,
        modelName: 'gpt-4o',
        cause: failure,
      });
    });

    test('sums attempts across both models when the fallback also fails', async () => {
      mockGenerateObject.mockRejectedValue(new Error('down'));

      const promise = LLMCaller.call({
        ...baseConfig(),
        retryPolicy: createPolicy(2),
        fallbackModel: 'anthropic/claude-sonnet-4',
      });

      await expect(promise).rejects.toMatchObject({
        attempts: 4,
        modelName: 'claude-sonnet-4',
        message:
          'LLM call to claude-sonnet-4 failed after 4 attempt(s): down',
      });
    });

    test('does not retry errors the policy rejects', async () => {
      mockGenerateObject.mockRejectedValue(new Error('invalid api key'));

      const promise = LLMCaller.call({
        ...baseConfig(),
        retryPolicy: new RetryPolicy({
          maxAttempts: 5,
          isRetryable: () => false,
          sleep: async () => {},
        }),
      });

      await expect(promise).rejects.toMatchObject({ attempts: 1 });
      expect(mockGenerateObject).toHaveBeenCalledTimes(1);
    });

    test('does not try the fallback when aborted', async () => {
      const controller = new AbortController();
      mockGenerateObject.mockImplementation(async () => {
        controller.abort();
        throw new Error('aborted');
      });

      await expect(
        LLMCaller.call({
          ...baseConfig(),
          fallbackModel: 'anthropic/claude-sonnet-4',
          abortSignal: controller.signal,
        }),
      ).rejects.toMatchObject({ modelName: 'gpt-4o', attempts: 1 });
      expect(mockGenerateObject).toHaveBeenCalledTimes(1);
    });

    test('runs each attempt through the limiter', async () => {
      const limiter = new ModelCallLimiter(1);
      const runSpy = vi.spyOn(limiter, 'run');
      mockGenerateObject
        .mockRejectedValueOnce(new Error('timeout'))
        .mockResolvedValueOnce(response('ok'));

      await LLMCaller.call({ ...baseConfig(), limiter });

      expect(runSpy).toHaveBeenCalledTimes(2);
    });
  });

  describe('callVision', () => {
    test('sends messages instead of a user prompt', async () => {
      mockGenerateObject.mockResolvedValueOnce(response('vision'));
      const messages = [
        {
          role: 'user' as const,
          content: [
            {
              type: 'file' as const,
              data: new Uint8Array([37, 80, 68, 70]),
              mediaType: 'application/pdf',
            },
          ],
        },
      ];

      const result = await LLMCaller.callVision({
        schema,
        systemPrompt: 'Read the attached bill',
        messages,
        primaryModel: 'openai/gpt-4o',
        retryPolicy: createPolicy(),
        component: 'ModelClient',
        phase: 'vision',
      });

      expect(result.output).toEqual({ result: 'vision' });
      expect(mockGenerateObject).toHaveBeenCalledWith(
        expect.objectContaining({
          system: 'Read the attached bill',
          messages,
        }),
      );
      expect(mockGenerateObject.mock.calls[0][0]).not.toHaveProperty('prompt');
    });
  });
});
