import { createHash } from 'node:crypto';

import type { NormalizedContent } from './content-normalizer';

/**
 * Deterministic identity of an analysis request: SHA-256 over the content
 * kind, model id, schema version and normalized content, as hex.
 */
export function computeFingerprint(
  content: NormalizedContent,
  modelId: string,
  schemaVersion: string,
): string {
  const hash = createHash('sha256');
  hash.update(`${content.kind}\u0000${modelId}\u0000${schemaVersion}\u0000`);
  hash.update(content.kind === 'pdf' ? content.data : content.text);
  return hash.digest('hex');
}
