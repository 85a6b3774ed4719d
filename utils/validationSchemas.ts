// utils/validationSchemas.ts
import { z } from 'zod';
import type { ICacheEntry, INewsArticleSummary, IResearchRecord, IWebResult } from '../types';

/**
 * Reusable Validation Rules
 */
const rules = {
    topic: z.string({ required_error: "Topic is required" })
        .trim()
        .min(1, "Topic is required")
        .max(200, "Topic cannot exceed 200 characters"),

    researchType: z.string()
        .trim()
        .max(50, "Research type cannot exceed 50 characters")
        .optional(),

    style: z.string().trim().min(1, "Style is required").max(50),

    // Long free text (summaries, drafts)
    text: (field: string) => z.string({ required_error: `${field} is required` })
        .min(1, `${field} is required`)
        .max(20000, `${field} cannot exceed 20000 characters`),
};

/**
 * Research Record Schemas (cache payload)
 */
export const SentimentSchema = z.enum(["Positive", "Negative", "Neutral"]);

const NewsArticleSummarySchema: z.ZodType<INewsArticleSummary> = z.object({
    title: z.string(),
    description: z.string(),
    url: z.string(),
    source: z.string(),
    published_at: z.string()
});

const WebResultSchema: z.ZodType<IWebResult> = z.object({
    title: z.string(),
    link: z.string(),
    snippet: z.string()
});

export const ResearchRecordSchema: z.ZodType<IResearchRecord> = z.object({
    topic: z.string(),
    research_type: z.string(),
    timestamp: z.string(),
    news_articles: z.array(NewsArticleSummarySchema),
    web_results: z.array(WebResultSchema),
    summary: z.string(),
    insights: z.string(),
    key_facts: z.string(),
    sentiment: SentimentSchema,
    cached: z.boolean()
});

// A timestamp we cannot parse makes freshness undecidable, so the entry is corrupt.
export const CacheEntrySchema: z.ZodType<ICacheEntry> = z.object({
    topic: z.string(),
    research_type: z.string(),
    cached_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "Invalid cached_at timestamp"),
    data: ResearchRecordSchema
});

/**
 * Request Schemas (strict mode: { body, query, params })
 */
const schemas = {
    research: z.object({
        body: z.object({
            topic: rules.topic,
            researchType: rules.researchType
        })
    }),

    angles: z.object({
        body: z.object({
            topic: rules.topic,
            summary: rules.text('Summary')
        })
    }),

    generatePost: z.object({
        body: z.object({
            topic: rules.topic,
            summary: rules.text('Summary'),
            style: rules.style,
            angle: z.string().trim().max(500).optional()
        })
    }),

    improveHook: z.object({
        body: z.object({
            topic: rules.topic,
            post: rules.text('Post')
        })
    }),

    regeneratePost: z.object({
        body: z.object({
            topic: rules.topic,
            summary: rules.text('Summary'),
            style: rules.style,
            previousPost: rules.text('Previous post')
        })
    }),

    invalidateCache: z.object({
        body: z.object({
            topic: rules.topic,
            researchType: rules.researchType
        })
    })
};

export default schemas;
