/**
 * Tests for MockEmbedder.
 */

import { describe, it, expect } from 'vitest';
import { MockEmbedder } from './MockEmbedder.js';
import { cosineSimilarity } from '../indexing/EmbeddingIndex.js';

describe('MockEmbedder', () => {
  it('should produce normalized vectors of the configured size', async () => {
    const embedder = new MockEmbedder({ dimensions: 16 });
    const [vector] = await embedder.embedDocuments(['quarterly budget review']);

    expect(vector).toHaveLength(16);
    const norm = Math.sqrt((vector ?? []).reduce((sum, x) => sum + x * x, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('should be deterministic and case-insensitive', () => {
    const embedder = new MockEmbedder();

    expect(embedder.vectorFor('Budget Review')).toEqual(embedder.vectorFor('budget review'));
  });

  it('should score texts with shared words above unrelated ones', () => {
    const embedder = new MockEmbedder({ dimensions: 256 });
    const query = embedder.vectorFor('budget');

    expect(cosineSimilarity(query, embedder.vectorFor('budget'))).toBeCloseTo(1, 10);
    expect(cosineSimilarity(query, embedder.vectorFor('budget planning'))).toBeGreaterThan(0);
  });

  it('should return a zero vector for text without words', () => {
    const embedder = new MockEmbedder({ dimensions: 4 });

    expect(embedder.vectorFor('  ---  ')).toEqual([0, 0, 0, 0]);
  });

  it('should count calls and fail on request', async () => {
    const embedder = new MockEmbedder({ failWhen: (texts) => texts.includes('poison') });

    await embedder.embedDocuments(['a', 'b']);
    await embedder.embedQuery('a');
    await expect(embedder.embedDocuments(['poison'])).rejects.toThrow(
      'Mock embedding failed for a batch of 1',
    );

    expect(embedder.documentCalls).toBe(2);
    expect(embedder.queryCalls).toBe(1);
    expect(embedder.embeddedTexts).toEqual(['a', 'b']);

    embedder.resetCounters();
    expect(embedder.embeddedCount).toBe(0);
  });
});
