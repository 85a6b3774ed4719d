import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import ResearchService, { buildResearchContent, parseSentiment } from '../services/researchService';
import { FileCacheStore } from '../services/cache/FileCacheStore';
import { ConfigurationError } from '../utils/AppError';
import { FakeCompletion, FakeSearch, makeArticle, scripted } from './fakes';
import type { ICompletionService } from '../services/completionService';
import type { INewsArticleSummary } from '../types';

const settings = { cacheEnabled: true, maxSearchResults: 10, daysBack: 30 };

// Answers each synthesis step by recognizing its prompt
const stepResponder = (prompt: string): string => {
  if (prompt.includes('structured summary')) return 'SUMMARY';
  if (prompt.includes('3 most important insights')) return 'INSIGHTS';
  if (prompt.includes('5 most important points')) return 'FACTS';
  if (prompt.includes('one word')) return 'positive.';
  return 'OTHER';
};

describe('parseSentiment', () => {
  it.each([
    ['Positive', 'Positive'],
    [' negative\n', 'Negative'],
    ['NEUTRAL.', 'Neutral'],
    ['Mixed', 'Neutral'],
    ['', 'Neutral'],
  ])('parses %j as %s', (reply, expected) => {
    expect(parseSentiment(reply)).toBe(expected);
  });
});

describe('buildResearchContent', () => {
  const article = (title: string, description: string): INewsArticleSummary => ({
    title, description, url: 'https://example.com', source: 'Wire', published_at: 'January 15, 2025'
  });

  it('lists news with descriptions and web results with snippets', () => {
    const content = buildResearchContent(
      'AI',
      [article('First', 'First desc'), article('Second', '')],
      [{ title: 'Web', link: 'https://example.com', snippet: 'Snippet' }]
    );
    expect(content).toBe(
      'Topic: AI\n\nRecent News:\n- First\n  First desc\n- Second\n\nWeb Results:\n- Web\n  Snippet\n'
    );
  });

  it('uses at most 5 articles and 3 web results', () => {
    const articles = Array.from({ length: 7 }, (_, i) => article(`A${i}`, ''));
    const web = Array.from({ length: 5 }, (_, i) => ({ title: `W${i}`, link: 'l', snippet: 's' }));
    const content = buildResearchContent('AI', articles, web);
    expect(content).toContain('- A4\n');
    expect(content).not.toContain('- A5\n');
    expect(content).toContain('- W2\n');
    expect(content).not.toContain('- W3\n');
  });
});

describe('ResearchService', () => {
  let dir: string;
  let cache: FileCacheStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'research-service-'));
    cache = new FileCacheStore(dir, { ttlHours: 24 });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const build = (
    completion: ICompletionService,
    search = new FakeSearch([makeArticle()]),
    overrides: Partial<typeof settings> = {}
  ) =>
    new ResearchService({ cache, search, completion, settings: { ...settings, ...overrides } });

  it('builds a fresh record from search and synthesis', async () => {
    const completion = new FakeCompletion(stepResponder);
    const search = new FakeSearch(
      [makeArticle({ title: 'Headline', publishedAt: '2025-01-15T10:00:00Z' })],
      [{ title: 'Web', link: 'https://example.com', snippet: 'Snippet' }]
    );
    const service = build(completion, search);

    const record = await service.research('  Anthropic  ', 'company');

    expect(record).toMatchObject({
      topic: 'Anthropic',
      research_type: 'company',
      summary: 'SUMMARY',
      insights: 'INSIGHTS',
      key_facts: 'FACTS',
      sentiment: 'Positive',
      cached: false
    });
    expect(record.news_articles).toEqual([
      {
        title: 'Headline',
        description: 'Description',
        url: 'https://example.com/a',
        source: 'Example Wire',
        published_at: 'January 15, 2025'
      }
    ]);
    expect(record.web_results).toEqual([{ title: 'Web', link: 'https://example.com', snippet: 'Snippet' }]);
    expect(search.newsCalls).toEqual([{ query: 'Anthropic', daysBack: 30, maxResults: 10 }]);
    expect(search.webCalls).toEqual([{ query: 'Anthropic', maxResults: 5 }]);
    expect(completion.calls).toHaveLength(4);
  });

  it('passes the documented sampling options per step', async () => {
    const completion = new FakeCompletion(stepResponder);
    await build(completion).research('AI', 'general');

    expect(completion.calls.map((c) => c.options)).toEqual([
      {},
      { maxTokens: 300 },
      { maxTokens: 300 },
      { temperature: 0.3, maxTokens: 10 }
    ]);
  });

  it('serves the second request from the cache with no external calls', async () => {
    const completion = new FakeCompletion(stepResponder);
    const search = new FakeSearch([makeArticle()]);
    const service = build(completion, search);

    const fresh = await service.research('Anthropic', 'company');
    const cached = await service.research('anthropic', 'Company');

    expect(cached).toEqual({ ...fresh, cached: true });
    expect(search.newsCalls).toHaveLength(1);
    expect(completion.calls).toHaveLength(4);
  });

  it('stores the record with cached set to false', async () => {
    await build(new FakeCompletion(stepResponder)).research('Anthropic', 'company');
    expect((await cache.get('Anthropic', 'company'))?.cached).toBe(false);
  });

  it('skips the cache when caching is disabled', async () => {
    const completion = new FakeCompletion(stepResponder);
    const service = build(completion, new FakeSearch(), { cacheEnabled: false });

    await service.research('AI', 'general');
    const second = await service.research('AI', 'general');

    expect(second.cached).toBe(false);
    expect(completion.calls).toHaveLength(8);
    expect((await cache.stats()).total).toBe(0);
  });

  it('uses every fallback when completion fails', async () => {
    const service = build(new FakeCompletion(() => null), new FakeSearch([makeArticle({ title: 'T', description: '' })]));

    const record = await service.research('AI', 'general');

    expect(record.summary).toBe('Topic: AI\n\nRecent News:\n- T\n\nWeb Results:\n');
    expect(record.insights).toBe('Unable to extract insights');
    expect(record.key_facts).toBe('');
    expect(record.sentiment).toBe('Neutral');
  });

  it('still completes with no search results', async () => {
    const service = build(new FakeCompletion(stepResponder), new FakeSearch([], []));
    const record = await service.research('AI', 'general');
    expect(record.news_articles).toEqual([]);
    expect(record.web_results).toEqual([]);
    expect(record.summary).toBe('SUMMARY');
  });

  it('truncates news to maxSearchResults', async () => {
    const articles = Array.from({ length: 4 }, (_, i) => makeArticle({ url: `https://example.com/${i}` }));
    const service = build(new FakeCompletion(stepResponder), new FakeSearch(articles), { maxSearchResults: 2 });
    expect((await service.research('AI', 'general')).news_articles).toHaveLength(2);
  });

  it('defaults an empty research type to general', async () => {
    const service = build(new FakeCompletion(stepResponder));
    const record = await service.research('AI', '  ');
    expect(record.research_type).toBe('general');
    expect(await cache.get('AI', 'general')).not.toBeNull();
  });

  it('rejects an empty topic before any call', async () => {
    const completion = new FakeCompletion(stepResponder);
    const search = new FakeSearch();
    const service = build(completion, search);

    await expect(service.research('   ', 'general')).rejects.toMatchObject({ statusCode: 400, message: 'Topic is required' });
    expect(search.newsCalls).toHaveLength(0);
    expect(completion.calls).toHaveLength(0);
  });

  it('propagates a missing completion key', async () => {
    const completion: ICompletionService = {
      complete: async () => {
        throw new ConfigurationError('OPENAI_API_KEY is not configured.');
      }
    };
    await expect(build(completion).research('AI', 'general')).rejects.toBeInstanceOf(ConfigurationError);
    expect((await cache.stats()).total).toBe(0);
  });

  describe('suggestAngles', () => {
    it('returns the completion', async () => {
      const completion = scripted('1. Angle');
      expect(await build(completion).suggestAngles('AI', 'summary')).toBe('1. Angle');
      expect(completion.calls[0].options).toEqual({ maxTokens: 300 });
    });

    it('truncates the summary to 1000 characters', async () => {
      const completion = scripted('ok');
      await build(completion).suggestAngles('AI', `${'a'.repeat(1000)}TAIL`);
      expect(completion.calls[0].prompt).toContain('a'.repeat(1000));
      expect(completion.calls[0].prompt).not.toContain('TAIL');
    });

    it('falls back to the default angles', async () => {
      expect(await build(scripted()).suggestAngles('AI', 'summary')).toBe(
        '1. Main news update\n2. Industry impact\n3. Personal take'
      );
    });
  });

  describe('cache administration', () => {
    it('invalidates, clears and reports stats', async () => {
      const service = build(new FakeCompletion(stepResponder));
      await service.research('one', 'general');
      await service.research('two', 'general');

      expect(await service.cacheStats()).toEqual({ total: 2, valid: 2, expired: 0, corrupt: 0, ttlHours: 24 });
      expect(await service.invalidate('ONE')).toBe(true);
      expect(await service.clearCache()).toBe(1);
      expect(await service.cacheStats()).toEqual({ total: 0, valid: 0, expired: 0, corrupt: 0, ttlHours: 24 });
    });
  });
});
