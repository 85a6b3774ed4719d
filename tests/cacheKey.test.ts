import { describe, expect, it } from 'vitest';
import crypto from 'crypto';
import { getCacheKey } from '../services/cache/cacheKey';

describe('getCacheKey', () => {
  it('is a sha256 hex digest', () => {
    expect(getCacheKey('Anthropic', 'company')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('hashes the lowercased JSON pair', () => {
    const expected = crypto.createHash('sha256').update('["anthropic","company"]').digest('hex');
    expect(getCacheKey('Anthropic', 'Company')).toBe(expected);
  });

  it('ignores case on both parts', () => {
    expect(getCacheKey('OpenAI GPT', 'Technology')).toBe(getCacheKey('openai gpt', 'TECHNOLOGY'));
  });

  it('is stable across calls', () => {
    expect(getCacheKey('topic', 'general')).toBe(getCacheKey('topic', 'general'));
  });

  it('separates different topics and types', () => {
    expect(getCacheKey('topic a', 'general')).not.toBe(getCacheKey('topic b', 'general'));
    expect(getCacheKey('topic', 'general')).not.toBe(getCacheKey('topic', 'technology'));
  });

  it('does not let characters move between topic and type', () => {
    expect(getCacheKey('a_b', 'c')).not.toBe(getCacheKey('a', 'b_c'));
    expect(getCacheKey('a b', 'c')).not.toBe(getCacheKey('a', 'b c'));
  });
});
