import { describe, expect, it } from 'vitest';
import ContentService, {
  PostStyle,
  buildFallbackHashtags,
  buildFallbackPost,
  resolvePostStyle
} from '../services/contentService';
import { FakeCompletion, scripted } from './fakes';

const SUMMARY = 'Key development one. Key development two.';

describe('resolvePostStyle', () => {
  it('matches labels exactly', () => {
    expect(resolvePostStyle('News Analysis')).toBe(PostStyle.NewsAnalysis);
    expect(resolvePostStyle('Educational Explainer')).toBe(PostStyle.Educational);
    expect(resolvePostStyle('Personal Opinion')).toBe(PostStyle.Opinion);
    expect(resolvePostStyle('Engagement Question')).toBe(PostStyle.Engagement);
    expect(resolvePostStyle('Trend Prediction')).toBe(PostStyle.Trend);
  });

  it('treats anything else as Generic', () => {
    expect(resolvePostStyle('news analysis')).toBe(PostStyle.Generic);
    expect(resolvePostStyle('Generic')).toBe(PostStyle.Generic);
    expect(resolvePostStyle('')).toBe(PostStyle.Generic);
  });
});

describe('fallback text', () => {
  it('builds the fallback post', () => {
    expect(buildFallbackPost('AI', '• point')).toBe(
      'Interesting developments in AI 🔍\n\n• point\n\nWhat are your thoughts on this?\n\n#Technology #Innovation #Business'
    );
  });

  it('joins the first two topic words into a hashtag', () => {
    expect(buildFallbackHashtags('Machine  Learning trends')).toBe('#MachineLearning #AI #Technology #Innovation #Business');
    expect(buildFallbackHashtags('Robotics')).toBe('#Robotics #AI #Technology #Innovation #Business');
  });
});

describe('ContentService', () => {
  it('lists the five style labels in order', () => {
    expect(new ContentService(scripted()).listStyles()).toEqual([
      'News Analysis',
      'Educational Explainer',
      'Personal Opinion',
      'Engagement Question',
      'Trend Prediction'
    ]);
  });

  describe('generate', () => {
    it('returns the fallback template when completion fails', async () => {
      const completion = new FakeCompletion(() => null);
      const post = await new ContentService(completion).generate('AI', SUMMARY, 'News Analysis');

      expect(post).toBe(
        `Interesting developments in AI 🔍\n\n${SUMMARY}\n\nWhat are your thoughts on this?\n\n#Technology #Innovation #Business`
      );
      // Key points and the post; the fallback already carries hashtags
      expect(completion.calls).toHaveLength(2);
    });

    it('falls back to the first 500 characters of the summary for key points', async () => {
      const completion = new FakeCompletion(() => null);
      const summary = `${'s'.repeat(500)}REST`;
      const post = await new ContentService(completion).generate('AI', summary, 'News Analysis');
      expect(post).toContain(`\n\n${'s'.repeat(500)}\n\n`);
      expect(post).not.toContain('REST');
    });

    it('appends suggested hashtags when the post has none', async () => {
      const completion = scripted('• KP', 'Post body without tags', '  #One #Two  ');
      const post = await new ContentService(completion).generate('AI', SUMMARY, 'News Analysis');

      expect(post).toBe('Post body without tags\n\n#One #Two');
      expect(completion.calls.map((c) => c.options)).toEqual([
        { maxTokens: 300 },
        { temperature: 0.7 },
        { temperature: 0.5, maxTokens: 50 }
      ]);
      expect(completion.calls[1].prompt).toContain('Facts: • KP');
    });

    it('keeps posts that already carry hashtags', async () => {
      const completion = scripted('• KP', '  Post with #tag  \n');
      const post = await new ContentService(completion).generate('AI', SUMMARY, 'Trend Prediction');

      expect(post).toBe('Post with #tag');
      expect(completion.calls).toHaveLength(2);
      expect(completion.calls[1].options).toEqual({ temperature: 0.8 });
    });

    it('uses fallback hashtags when the suggestion fails', async () => {
      const completion = scripted('• KP', 'Plain post');
      const post = await new ContentService(completion).generate('Machine Learning trends', SUMMARY, 'Educational Explainer');

      expect(post).toBe('Plain post\n\n#MachineLearning #AI #Technology #Innovation #Business');
    });

    it('gives the opinion style a stance', async () => {
      const completion = scripted('• KP', 'Opinion #x');
      await new ContentService(completion).generate('AI', SUMMARY, 'Personal Opinion');

      expect(completion.calls[1].prompt).toContain('Your Stance: This development in AI is significant');
      expect(completion.calls[1].options).toEqual({ temperature: 0.8 });
    });

    it('uses the base prompt and default temperature for unknown styles', async () => {
      const completion = scripted('• KP', 'Generic #x');
      await new ContentService(completion).generate('AI', SUMMARY, 'Haiku');

      expect(completion.calls[1].prompt).toContain('Style: Informative');
      expect(completion.calls[1].options).toEqual({});
    });

    it('adds the angle to the prompt only when given', async () => {
      const withAngle = scripted('• KP', 'Post #x');
      await new ContentService(withAngle).generate('AI', SUMMARY, 'Engagement Question', 'Hidden costs');
      expect(withAngle.calls[1].prompt).toContain('Focus Angle: Hidden costs');

      const withoutAngle = scripted('• KP', 'Post #x');
      await new ContentService(withoutAngle).generate('AI', SUMMARY, 'Engagement Question');
      expect(withoutAngle.calls[1].prompt).not.toContain('Focus Angle');
    });

    it('rejects an empty topic', async () => {
      const completion = scripted();
      await expect(new ContentService(completion).generate(' ', SUMMARY, 'News Analysis')).rejects.toMatchObject({
        statusCode: 400
      });
      expect(completion.calls).toHaveLength(0);
    });
  });

  describe('improveHook', () => {
    it('replaces only the first line', async () => {
      const completion = scripted('  A sharper hook  ');
      const post = await new ContentService(completion).improveHook('Old hook\nLine two\n\nLine three', 'AI');

      expect(post).toBe('A sharper hook\nLine two\n\nLine three');
      expect(completion.calls[0].prompt).toContain('Current: Old hook');
      expect(completion.calls[0].options).toEqual({ temperature: 0.8, maxTokens: 50 });
    });

    it('returns the post unchanged on failure', async () => {
      const post = 'Old hook\nLine two';
      expect(await new ContentService(scripted()).improveHook(post, 'AI')).toBe(post);
    });
  });

  describe('regenerate', () => {
    it('enhances the new post', async () => {
      const completion = scripted('A different post', '#Fresh #Tags');
      const post = await new ContentService(completion).regenerate('AI', SUMMARY, 'News Analysis', 'Old post');

      expect(post).toBe('A different post\n\n#Fresh #Tags');
      expect(completion.calls[0].options).toEqual({ temperature: 0.9 });
      expect(completion.calls[0].prompt).toContain('Previous post:\nOld post');
    });

    it('truncates the research to 500 characters', async () => {
      const completion = scripted('New #post');
      await new ContentService(completion).regenerate('AI', `${'r'.repeat(500)}TAIL`, 'News Analysis', 'Old');
      expect(completion.calls[0].prompt).toContain(`Research: ${'r'.repeat(500)}\n`);
      expect(completion.calls[0].prompt).not.toContain('TAIL');
    });

    it('returns the previous post on failure', async () => {
      expect(await new ContentService(scripted()).regenerate('AI', SUMMARY, 'News Analysis', 'Old post')).toBe('Old post');
    });
  });
});
