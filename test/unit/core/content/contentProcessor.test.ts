import { describe, test, expect } from '@jest/globals';
import { ContentProcessor } from '../../../../src/core/content/contentProcessor';
import type { ContentItem } from '../../../../src/core/types';
import { silentLogger } from '../../../helpers/fakes';

function item(sourceUrl: string, content: string, title = 'Title'): ContentItem {
  return { title, content, contentType: 'blog', sourceUrl };
}

const SHARED = 'Subscribe to our newsletter for updates from the harbour. '.repeat(4);

function processor(chunkSize = 100_000): ContentProcessor {
  return new ContentProcessor({ log: silentLogger, chunkSize, templateThreshold: 3 });
}

describe('ContentProcessor', () => {
  test('drops exact duplicates, keeping the first', () => {
    const first = item('https://example.com/blog/a', 'alpha body', 'A');
    const copy = item('https://example.com/blog/a-copy', 'alpha body', 'A copy');
    const other = item('https://example.com/blog/b', 'beta body', 'B');

    expect(processor().process([first, copy, other])).toEqual([first, other]);
  });

  test('drops template content served on many blog URLs', () => {
    const templated = Array.from({ length: 5 }, (_, i) => item(`https://example.com/blog/post-${i}`, SHARED));
    const distinct = item('https://example.com/blog/real', 'A real article about the harbour.');

    expect(processor().process([...templated, distinct])).toEqual([distinct]);
  });

  test('keeps one copy of repeated content on non-blog URLs', () => {
    const repeated = Array.from({ length: 4 }, (_, i) => item(`https://example.com/learn/page-${i}`, SHARED));
    expect(processor().process(repeated)).toEqual([repeated[0]]);
  });

  test('keeps a marked representative when everything is template content', () => {
    const templated = Array.from({ length: 4 }, (_, i) => item(`https://example.com/blog/post-${i}`, SHARED, `Post ${i}`));

    expect(processor().process(templated)).toEqual([{ ...templated[0], title: '[Template Content] Post 0' }]);
    expect(templated[0].title).toBe('Post 0');
  });

  test('content repeated up to the threshold is only deduplicated', () => {
    const repeated = Array.from({ length: 3 }, (_, i) => item(`https://example.com/blog/post-${i}`, SHARED));
    expect(processor().process(repeated)).toEqual([repeated[0]]);
  });

  test('chunks oversized items after deduplication', () => {
    const content = Array.from({ length: 8 }, (_, i) => String.fromCharCode(97 + i).repeat(600)).join('\n\n');
    const result = processor(2000).process([item('https://example.com/blog/long', content, 'Long')]);

    expect(result.map(part => part.title)).toEqual(['Long (Part 1)', 'Long (Part 2)', 'Long (Part 3)']);
  });

  test('is idempotent', () => {
    const content = Array.from({ length: 8 }, (_, i) => String.fromCharCode(97 + i).repeat(600)).join('\n\n');
    const input = [
      item('https://example.com/blog/long', content, 'Long'),
      item('https://example.com/blog/short', 'short body'),
      item('https://example.com/blog/short-copy', 'short body'),
    ];

    const once = processor(2000).process(input);
    expect(processor(2000).process(once)).toEqual(once);
  });

  test('handles an empty input', () => {
    expect(processor().process([])).toEqual([]);
  });
});
