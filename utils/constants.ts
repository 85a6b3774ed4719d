// utils/constants.ts

export const ONE_MINUTE = 60 * 1000;
export const ONE_HOUR = 60 * ONE_MINUTE;

// --- CENTRAL CONFIGURATION ---
export const CONSTANTS = {
  // Timeouts (Standardized)
  TIMEOUTS: {
    DEFAULT_API: 30000,
    SEARCH_API: 10000, // A slow search source fails on its own, never the pipeline
    COMPLETION_API: 60000,
  },

  // Research Cache
  CACHE: {
    KEY_PREFIX: 'research-cache:',
    FILE_EXTENSION: '.json',
  },

  // Research Orchestration
  RESEARCH: {
    DEFAULT_TYPE: 'general',
    WEB_RESULTS: 5,
    SUMMARY_NEWS_ITEMS: 5, // Articles folded into the synthesis input
    SUMMARY_WEB_ITEMS: 3,
    SENTIMENT_INPUT_CHARS: 500,
    ANGLES_INPUT_CHARS: 1000,
  },

  // Content Generation
  CONTENT: {
    KEY_POINTS_INPUT_CHARS: 1500,
    KEY_POINTS_FALLBACK_CHARS: 500,
    HASHTAG_INPUT_CHARS: 500,
    REGENERATE_INPUT_CHARS: 500,
  },

  // Completion sampling per task
  COMPLETION: {
    ANALYSIS_MAX_TOKENS: 300,
    SENTIMENT_TEMPERATURE: 0.3,
    SENTIMENT_MAX_TOKENS: 10,
    HASHTAG_TEMPERATURE: 0.5,
    HASHTAG_MAX_TOKENS: 50,
    HOOK_TEMPERATURE: 0.8,
    HOOK_MAX_TOKENS: 50,
    REGENERATE_TEMPERATURE: 0.9,
  },

  // Documented fallback values
  FALLBACKS: {
    INSIGHTS: 'Unable to extract insights',
    KEY_FACTS: '',
    SENTIMENT: 'Neutral',
    ANGLES: '1. Main news update\n2. Industry impact\n3. Personal take',
    HASHTAG_SUFFIX: '#AI #Technology #Innovation #Business',
  },
} as const;

// Research types offered to the presentation layer. Any non-empty string is accepted.
export const RESEARCH_TYPES = ['Company News', 'Technology', 'Market Trend', 'Industry News'] as const;
