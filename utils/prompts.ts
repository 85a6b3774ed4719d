// utils/prompts.ts

const POST_GUIDELINES = `
Post Guidelines:
- The first line is the hook. It must stop the scroll.
- Short paragraphs, two or three lines each.
- A few relevant emojis, never a wall of them.
- Professional but conversational.
`;

// --- Research ---

const RESEARCH_SUMMARY = `
Role: You are a research analyst.
Task: Analyze the following information about "{{topic}}".

{{content}}

--- INSTRUCTIONS ---
Provide a structured summary with:
1. Key Facts (bullet points)
2. Main Insights (2-3 sentences)
3. Implications (what this means)
4. Sentiment (overall tone: positive, negative or neutral)

Be concise and focus on actionable insights.
`;

const RESEARCH_INSIGHTS = `
Role: You are a research analyst.
Task: Identify the 3 most important insights or takeaways from this research summary about {{topic}}.

Summary:
{{summary}}

--- OUTPUT FORMAT ---
1. [First insight]
2. [Second insight]
3. [Third insight]
`;

const KEY_FACTS = `
Extract the 5 most important points from this content:

{{content}}

Format as a numbered list. Each point should be one clear sentence.
`;

const SENTIMENT = `
Analyze the overall sentiment of this text in one word: Positive, Negative, or Neutral.

Text: {{text}}

Answer with just one word:`;

const RESEARCH_ANGLES = `
Role: You are a LinkedIn content strategist.
Task: Based on this research about {{topic}}, suggest 5 interesting angles for LinkedIn posts. Each angle should be one sentence.

Research Summary:
{{summary}}

--- OUTPUT FORMAT ---
1. [Angle 1]
2. [Angle 2]
3. [Angle 3]
4. [Angle 4]
5. [Angle 5]
`;

// --- Posts ---

const POST_KEY_POINTS = `
From this research summary, extract 3-5 key points that would be interesting for a LinkedIn post.

Summary:
{{summary}}

Return as a bulleted list:
• Point 1
• Point 2
• Point 3
`;

const POST_BASE = `
Role: You are a LinkedIn content expert.
Task: Create an engaging LinkedIn post.

Topic: {{topic}}
Style: {{style}}
Key Points: {{keyPoints}}
{{angle}}
${POST_GUIDELINES}
- End with an engagement question or call to action.
- Add 3-5 relevant hashtags at the end.
- Length: 150-250 words.

Write the post now:
`;

const POST_NEWS_ANALYSIS = `
Task: Write a LinkedIn post analyzing recent news.

Topic: {{topic}}
Facts: {{keyPoints}}
{{angle}}
--- STRUCTURE ---
1. Lead with the news (what happened)
2. Why it matters (2-3 points)
3. Implications for the industry
4. Your perspective or prediction
5. Engagement question
${POST_GUIDELINES}
Tone: Analytical but accessible. Length: 150-200 words. Include hashtags.

Write the post:
`;

const POST_EDUCATIONAL = `
Task: Write an educational LinkedIn post that teaches something.

Topic: {{topic}}
Key Concepts: {{keyPoints}}
{{angle}}
--- STRUCTURE ---
1. Hook: a common misconception or question
2. Clear explanation (use analogies if helpful)
3. Practical example
4. Key takeaway
5. Ask readers about their experience
${POST_GUIDELINES}
Tone: Friendly teacher, not condescending. Length: 150-250 words. Include hashtags.

Write the post:
`;

const POST_OPINION = `
Task: Write a LinkedIn post sharing a personal opinion or hot take.

Topic: {{topic}}
Your Stance: {{stance}}
Supporting Points: {{keyPoints}}
{{angle}}
--- STRUCTURE ---
1. Bold opening statement (your opinion)
2. Context (why you are talking about this)
3. Your reasoning (2-3 points)
4. Acknowledge other perspectives
5. Invite debate
${POST_GUIDELINES}
Tone: Confident but respectful. Length: 150-200 words. Include hashtags.

Write the post:
`;

const POST_ENGAGEMENT = `
Task: Write a LinkedIn post that sparks conversation.

Topic: {{topic}}
Context: {{keyPoints}}
{{angle}}
--- STRUCTURE ---
1. Present an interesting question or scenario
2. Provide context (1-2 paragraphs)
3. Show different perspectives
4. Ask for audience input
${POST_GUIDELINES}
Tone: Curious and inviting. Length: 100-150 words. Focus on comments.

Write the post:
`;

const POST_TREND = `
Task: Write a LinkedIn post predicting future trends based on {{topic}}.

Current insights:
{{keyPoints}}
{{angle}}
--- STRUCTURE ---
1. What is happening now
2. Why it matters
3. What is coming next (prediction)
4. How to prepare
5. Engagement question
${POST_GUIDELINES}
Tone: Analytical but accessible. Length: 150-200 words. Include hashtags.

Write the post:
`;

const IMPROVE_HOOK = `
Improve this opening line for a LinkedIn post:

Current: {{hook}}
Topic: {{topic}}

Make it more attention-grabbing. Use curiosity, surprise, or a bold statement.
Return only the improved hook (one line).
`;

const HASHTAGS = `
Suggest 5 relevant hashtags for this LinkedIn post:

{{post}}

Return as: #Tag1 #Tag2 #Tag3 #Tag4 #Tag5
Mix popular and niche tags.
`;

const REGENERATE = `
The following LinkedIn post needs to be rewritten with a fresh angle:

Previous post:
{{previousPost}}

Topic: {{topic}}
Style: {{style}}
Research: {{summary}}

Generate a completely different post on the same topic with:
- A different opening hook
- A different angle or perspective
- Different examples or points
- The same professional tone
- 150-200 words

Write the new post:
`;

export const PROMPTS = {
  RESEARCH_SUMMARY,
  RESEARCH_INSIGHTS,
  KEY_FACTS,
  SENTIMENT,
  RESEARCH_ANGLES,
  POST_KEY_POINTS,
  POST_BASE,
  POST_NEWS_ANALYSIS,
  POST_EDUCATIONAL,
  POST_OPINION,
  POST_ENGAGEMENT,
  POST_TREND,
  IMPROVE_HOOK,
  HASHTAGS,
  REGENERATE,
} as const;

export type PromptName = keyof typeof PROMPTS;

// Unknown placeholders are left in place so a missing value is visible in logs
export const interpolate = (template: string, data: Record<string, string>): string =>
  template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => {
    const value = data[key];
    return value !== undefined ? value : match;
  });

export const buildPrompt = (name: PromptName, data: Record<string, string>): string =>
  interpolate(PROMPTS[name], data).trim();

// Rendered into the {{angle}} slot of every post template
export const formatAngleLine = (angle: string | undefined): string => {
  const trimmed = angle?.trim();
  return trimmed ? `Focus Angle: ${trimmed}\n` : '';
};
