// services/researchService.ts
import logger from '../utils/logger';
import AppError from '../utils/AppError';
import { CONSTANTS } from '../utils/constants';
import { formatDisplayDate, truncate } from '../utils/helpers';
import { buildPrompt } from '../utils/prompts';
import { unwrapOr } from '../utils/result';
import type {
  ICacheStats,
  INewsArticleSummary,
  INewsSourceArticle,
  IResearchRecord,
  IWebResult,
  Sentiment
} from '../types';
import type { ICacheStore } from './cache';
import type { ICompletionService } from './completionService';
import type { ISearchService } from './searchService';

const { RESEARCH, COMPLETION, FALLBACKS } = CONSTANTS;

export interface ResearchSettings {
  cacheEnabled: boolean;
  maxSearchResults: number;
  daysBack: number;
}

export interface ResearchDependencies {
  cache: ICacheStore;
  search: ISearchService;
  completion: ICompletionService;
  settings: ResearchSettings;
}

const SENTIMENTS: readonly Sentiment[] = ['Positive', 'Negative', 'Neutral'];

/**
 * Case-insensitive match of a one-word model reply ("positive.", " NEGATIVE").
 * Anything unrecognized is Neutral.
 */
export const parseSentiment = (reply: string): Sentiment => {
  const word = reply.trim().toLowerCase().replace(/[^a-z]/g, '');
  return SENTIMENTS.find((s) => s.toLowerCase() === word) ?? 'Neutral';
};

// Input text for the summary prompt, also the summary itself when completion fails
export const buildResearchContent = (
  topic: string,
  articles: INewsArticleSummary[],
  webResults: IWebResult[]
): string => {
  let content = `Topic: ${topic}\n\n`;

  content += 'Recent News:\n';
  for (const article of articles.slice(0, RESEARCH.SUMMARY_NEWS_ITEMS)) {
    content += `- ${article.title}\n`;
    if (article.description) {
      content += `  ${article.description}\n`;
    }
  }

  content += '\nWeb Results:\n';
  for (const result of webResults.slice(0, RESEARCH.SUMMARY_WEB_ITEMS)) {
    content += `- ${result.title}\n`;
    content += `  ${result.snippet}\n`;
  }

  return content;
};

const toArticleSummary = (article: INewsSourceArticle): INewsArticleSummary => ({
  title: article.title,
  description: article.description,
  url: article.url,
  source: article.source.name || 'Unknown',
  published_at: formatDisplayDate(article.publishedAt)
});

const requireTopic = (topic: string): string => {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new AppError('Topic is required', 400);
  }
  return trimmed;
};

class ResearchService {
  private readonly cache: ICacheStore;
  private readonly search: ISearchService;
  private readonly completion: ICompletionService;
  private readonly settings: ResearchSettings;

  constructor({ cache, search, completion, settings }: ResearchDependencies) {
    this.cache = cache;
    this.search = search;
    this.completion = completion;
    this.settings = settings;
  }

  /**
   * Cached research for a topic, or a fresh one built from news and web search.
   * Collaborator failures fall back to fixed values; only a missing
   * completion key (ConfigurationError) propagates.
   */
  async research(topic: string, researchType: string = RESEARCH.DEFAULT_TYPE): Promise<IResearchRecord> {
    const cleanTopic = requireTopic(topic);
    const type = researchType.trim() || RESEARCH.DEFAULT_TYPE;

    logger.info(`🔍 Researching: ${cleanTopic} (${type})`);

    if (this.settings.cacheEnabled) {
      const cached = await this.cache.get(cleanTopic, type);
      if (cached) {
        logger.info(`⚡ Using cached research for: ${cleanTopic}`);
        return { ...cached, cached: true };
      }
    }

    logger.info('🌐 Fetching fresh data from search providers...');

    const sourceArticles = await this.search.searchNews(
      cleanTopic,
      this.settings.daysBack,
      this.settings.maxSearchResults
    );
    const newsArticles = sourceArticles.slice(0, this.settings.maxSearchResults).map(toArticleSummary);
    const webResults = await this.search.searchWeb(cleanTopic, RESEARCH.WEB_RESULTS);

    const summary = await this.generateSummary(cleanTopic, newsArticles, webResults);
    const insights = await this.extractInsights(cleanTopic, summary);
    const keyFacts = await this.extractKeyFacts(summary);
    const sentiment = await this.analyzeSentiment(summary);

    const record: IResearchRecord = {
      topic: cleanTopic,
      research_type: type,
      timestamp: new Date().toISOString(),
      news_articles: newsArticles,
      web_results: webResults,
      summary,
      insights,
      key_facts: keyFacts,
      sentiment,
      cached: false
    };

    if (this.settings.cacheEnabled) {
      await this.cache.set(cleanTopic, type, record);
    }

    return record;
  }

  async suggestAngles(topic: string, summary: string): Promise<string> {
    const cleanTopic = requireTopic(topic);
    const prompt = buildPrompt('RESEARCH_ANGLES', {
      topic: cleanTopic,
      summary: truncate(summary, RESEARCH.ANGLES_INPUT_CHARS)
    });

    const result = await this.completion.complete(prompt, { maxTokens: COMPLETION.ANALYSIS_MAX_TOKENS });
    return unwrapOr(result, FALLBACKS.ANGLES);
  }

  // --- Cache Administration ---

  async invalidate(topic: string, researchType: string = RESEARCH.DEFAULT_TYPE): Promise<boolean> {
    const cleanTopic = requireTopic(topic);
    return this.cache.invalidate(cleanTopic, researchType.trim() || RESEARCH.DEFAULT_TYPE);
  }

  async clearCache(): Promise<number> {
    return this.cache.clearAll();
  }

  async cacheStats(): Promise<ICacheStats> {
    return this.cache.stats();
  }

  // --- Synthesis Steps ---

  private async generateSummary(
    topic: string,
    articles: INewsArticleSummary[],
    webResults: IWebResult[]
  ): Promise<string> {
    const content = buildResearchContent(topic, articles, webResults);
    const result = await this.completion.complete(buildPrompt('RESEARCH_SUMMARY', { topic, content }));
    return unwrapOr(result, content);
  }

  private async extractInsights(topic: string, summary: string): Promise<string> {
    const result = await this.completion.complete(
      buildPrompt('RESEARCH_INSIGHTS', { topic, summary }),
      { maxTokens: COMPLETION.ANALYSIS_MAX_TOKENS }
    );
    return unwrapOr(result, FALLBACKS.INSIGHTS);
  }

  private async extractKeyFacts(summary: string): Promise<string> {
    const result = await this.completion.complete(
      buildPrompt('KEY_FACTS', { content: summary }),
      { maxTokens: COMPLETION.ANALYSIS_MAX_TOKENS }
    );
    return unwrapOr(result, FALLBACKS.KEY_FACTS);
  }

  private async analyzeSentiment(summary: string): Promise<Sentiment> {
    const result = await this.completion.complete(
      buildPrompt('SENTIMENT', { text: truncate(summary, RESEARCH.SENTIMENT_INPUT_CHARS) }),
      { temperature: COMPLETION.SENTIMENT_TEMPERATURE, maxTokens: COMPLETION.SENTIMENT_MAX_TOKENS }
    );
    return result.ok ? parseSentiment(result.value) : FALLBACKS.SENTIMENT;
  }
}

export default ResearchService;
