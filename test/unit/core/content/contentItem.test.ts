import { describe, test, expect } from '@jest/globals';
import {
  UNTITLED,
  buildContentItem,
  firstMarkdownHeading,
  resolveTitle,
} from '../../../../src/core/content/contentItem';

const BODY = 'A quiet harbour town wakes slowly. '.repeat(5);

describe('contentItem', () => {
  test('firstMarkdownHeading finds the first level-one heading', () => {
    expect(firstMarkdownHeading('intro\n\n## Sub\n\n#   Main title  \n\n# Later')).toBe('Main title');
    expect(firstMarkdownHeading('## Only a subheading')).toBeUndefined();
  });

  test('resolveTitle prefers metadata, then heading, then page title', () => {
    expect(resolveTitle({ markdown: '# Heading', metadataTitle: 'Meta', pageTitle: 'Page' })).toBe('Meta');
    expect(resolveTitle({ markdown: '# Heading', pageTitle: 'Page' })).toBe('Heading');
    expect(resolveTitle({ markdown: 'no heading', pageTitle: 'Page' })).toBe('Page');
    expect(resolveTitle({ markdown: 'no heading', metadataTitle: '   ' })).toBe(UNTITLED);
  });

  test('resolveTitle collapses whitespace', () => {
    expect(resolveTitle({ markdown: '', metadataTitle: '  Two\n  lines ' })).toBe('Two lines');
  });

  test('buildContentItem trims and classifies', () => {
    const item = buildContentItem('https://example.com/blog/harbour', {
      markdown: `\n\n# Harbour\n\n${BODY}\n\n`,
    });
    expect(item).toEqual({
      title: 'Harbour',
      content: `# Harbour\n\n${BODY}`.trim(),
      contentType: 'blog',
      sourceUrl: 'https://example.com/blog/harbour',
    });
  });

  test('buildContentItem drops content shorter than 100 characters', () => {
    expect(buildContentItem('https://example.com/blog/x', { markdown: `   ${'a'.repeat(99)}   ` })).toBeNull();
    expect(buildContentItem('https://example.com/blog/x', { markdown: 'a'.repeat(100) })).not.toBeNull();
  });
});
