import { describe, expect, test } from 'vitest';

import { computeFingerprint } from './fingerprint';

describe('computeFingerprint', () => {
  const text = { kind: 'text' as const, text: 'SECTION 1. Short title.' };

  test('is a stable SHA-256 hex digest', () => {
    const fingerprint = computeFingerprint(text, 'gpt-4o', '2025-01');

    expect(fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(computeFingerprint(text, 'gpt-4o', '2025-01')).toBe(fingerprint);
  });

  test('changes with the content, model and schema version', () => {
    const base = computeFingerprint(text, 'gpt-4o', '2025-01');

    expect(
      computeFingerprint({ kind: 'text', text: 'SECTION 2.' }, 'gpt-4o', '2025-01'),
    ).not.toBe(base);
    expect(computeFingerprint(text, 'gpt-4o-mini', '2025-01')).not.toBe(base);
    expect(computeFingerprint(text, 'gpt-4o', '2025-02')).not.toBe(base);
  });

  test('distinguishes PDF bytes from text with the same characters', () => {
    const bytes = new TextEncoder().encode(text.text);

    expect(
      computeFingerprint({ kind: 'pdf', data: bytes }, 'gpt-4o', '2025-01'),
    ).not.toBe(computeFingerprint(text, 'gpt-4o', '2025-01'));
  });
});
