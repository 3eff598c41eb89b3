import { describe, test, expect } from '@jest/globals';
import { feedSource, parseFeedLinks } from '../../../../src/core/discovery/feedSource';
import { FakeHttp, discoveryContext } from '../../../helpers/fakes';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example</title>
    <link>https://example.com/</link>
    <description>Posts</description>
    <item><title>One</title><link>https://example.com/blog/one</link></item>
    <item><title>Two</title><link>/blog/two</link></item>
    <item><title>Elsewhere</title><link>https://other.org/blog/three</link></item>
    <item><title>No link</title></item>
  </channel>
</rss>`;

describe('feedSource', () => {
  test('parseFeedLinks keeps same-host item links', async () => {
    const links = await parseFeedLinks(RSS, 'https://example.com/rss', 'example.com');
    expect(links).toEqual(['https://example.com/blog/one', 'https://example.com/blog/two']);
  });

  test('parseFeedLinks rejects documents that are not feeds', async () => {
    await expect(parseFeedLinks('<html><body><p>hi</p></body></html>', 'https://example.com/feed', 'example.com')).rejects.toThrow();
  });

  test('discover skips HTML answers and collects real feeds', async () => {
    const http = new FakeHttp({
      'https://example.com/feed': '<html><body><p>Not a feed</p></body></html>',
      'https://example.com/rss': RSS,
    });

    const urls = await feedSource.discover(discoveryContext(http));

    expect(urls).toEqual(['https://example.com/blog/one', 'https://example.com/blog/two']);
    expect(http.requests).toEqual([
      'https://example.com/feed',
      'https://example.com/rss',
      'https://example.com/feed.xml',
      'https://example.com/rss.xml',
      'https://example.com/atom.xml',
      'https://example.com/blog/feed',
      'https://example.com/blog/rss',
    ]);
  });
});
