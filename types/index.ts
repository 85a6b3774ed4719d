// types/index.ts

export type Sentiment = 'Positive' | 'Negative' | 'Neutral';

// --- 1. Raw Search Results (Provider-normalized) ---
export interface INewsSourceArticle {
  source: { name: string };
  title: string;
  description: string;
  url: string;
  publishedAt: string;
}

export interface IWebResult {
  title: string;
  link: string;
  snippet: string;
}

// --- 2. Research Record (the cached payload) ---
export interface INewsArticleSummary {
  title: string;
  description: string;
  url: string;
  source: string;
  published_at: string;
}

export interface IResearchRecord {
  topic: string;
  research_type: string;
  timestamp: string; // Generation time, ISO-8601
  news_articles: INewsArticleSummary[];
  web_results: IWebResult[];
  summary: string;
  insights: string;
  key_facts: string;
  sentiment: Sentiment;
  cached: boolean; // Set by the orchestrator, never by the store
}

// --- 3. Cache ---
// Self-describing entry as persisted by every cache backend
export interface ICacheEntry {
  topic: string;
  research_type: string;
  cached_at: string; // ISO-8601
  data: IResearchRecord;
}

export interface ICacheStats {
  total: number;
  valid: number;
  expired: number;
  corrupt: number;
  ttlHours: number;
}

// --- 4. Completion ---
export interface ICompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

// --- 5. OpenAI-compatible chat completion payload ---
export interface IChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
