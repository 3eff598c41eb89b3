import { describe, test, expect } from '@jest/globals';
import { classifyContent } from '../../../../src/core/content/classifier';

const words = (count: number, word = 'harbour'): string => Array.from({ length: count }, () => word).join(' ');

describe('classifyContent', () => {
  test('platform domains win over everything else', () => {
    expect(classifyContent('https://writer.substack.com/p/podcast-notes', 'Podcast', '')).toBe('blog');
    expect(classifyContent('https://www.linkedin.com/posts/someone', 'Update', '')).toBe('linkedin_post');
    expect(classifyContent('https://www.reddit.com/r/x/comments/1', 'Thread', '')).toBe('reddit_comment');
  });

  test('keywords in URL or title decide in a fixed order', () => {
    expect(classifyContent('https://example.com/blog/x', 'Episode 12 transcript', '')).toBe('podcast_transcript');
    expect(classifyContent('https://example.com/interviews/ada', 'Meet Ada', '')).toBe('call_transcript');
    expect(classifyContent('https://example.com/docs/chapter-2', 'Setup', '')).toBe('book');
    expect(classifyContent('https://example.com/news/launch', 'We launched', '')).toBe('news');
    expect(classifyContent('https://example.com/blog/x', 'Product update', '')).toBe('news');
  });

  test('tutorial phrases need more than a hundred words', () => {
    const shortBody = 'Step 1 of how to brew tea.';
    const longBody = `Step 1 of how to brew tea. ${words(120)}`;
    expect(classifyContent('https://example.com/blog/tea', 'Tea', shortBody)).toBe('blog');
    expect(classifyContent('https://example.com/blog/tea', 'Tea', longBody)).toBe('tutorial');
  });

  test('a single tutorial phrase is not enough', () => {
    const body = `Here is how to think about tea. ${words(120)}`;
    expect(classifyContent('https://example.com/blog/tea', 'Tea', body)).toBe('blog');
  });

  test('three numbered steps near the start mark a tutorial', () => {
    const body = `1. Boil water 2. Warm pot 3. Steep leaves ${words(120)}`;
    expect(classifyContent('https://example.com/blog/tea', 'Tea', body)).toBe('tutorial');
  });

  test('numbered steps beyond the first two hundred words do not count', () => {
    const body = `${words(200)} 1. Boil 2. Warm 3. Steep`;
    expect(classifyContent('https://example.com/blog/tea', 'Tea', body)).toBe('blog');
  });

  test('is deterministic', () => {
    const body = `Follow these steps for a walkthrough. ${words(150)}`;
    const first = classifyContent('https://example.com/blog/tea', 'Tea', body);
    expect(classifyContent('https://example.com/blog/tea', 'Tea', body)).toBe(first);
    expect(first).toBe('tutorial');
  });
});
