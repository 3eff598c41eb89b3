import { describe, test, expect } from '@jest/globals';
import {
  isSitemapIndex,
  parseSitemapIndex,
  parseUrlset,
  selectRecent,
  sitemapSource,
  sitemapsFromRobots,
} from '../../../../src/core/discovery/sitemapSource';
import { FakeHttp, discoveryContext, networkFailure } from '../../../helpers/fakes';

function urlset(entries: Array<{ loc: string; lastmod?: string }>): string {
  const body = entries
    .map(({ loc, lastmod }) => `<url><loc>${loc}</loc>${lastmod ? `<lastmod>${lastmod}</lastmod>` : ''}</url>`)
    .join('');
  return `<?xml version="1.0" encoding="UTF-8"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${body}</urlset>`;
}

function sitemapIndex(locs: string[]): string {
  const body = locs.map(loc => `<sitemap><loc>${loc}</loc></sitemap>`).join('');
  return `<?xml version="1.0" encoding="UTF-8"?><sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${body}</sitemapindex>`;
}

describe('sitemapSource', () => {
  describe('parseUrlset', () => {
    test('keeps content URLs and the date part of lastmod', () => {
      const xml = urlset([
        { loc: 'https://example.com/blog/alpha', lastmod: '2024-05-06T10:00:00+00:00' },
        { loc: 'https://example.com/about' },
        { loc: 'https://example.com/blog/beta', lastmod: 'yesterday' },
      ]);

      const { entries, processed } = parseUrlset(xml, 'example.com');

      expect(processed).toBe(3);
      expect(entries).toEqual([
        { url: 'https://example.com/blog/alpha', lastmod: '2024-05-06' },
        { url: 'https://example.com/blog/beta' },
      ]);
    });

    test('stops after 2000 url elements', () => {
      const xml = urlset(Array.from({ length: 3000 }, (_, i) => ({ loc: `https://other.org/blog/post-${i}` })));
      const { entries, processed } = parseUrlset(xml, 'example.com');
      expect(processed).toBe(2000);
      expect(entries).toHaveLength(0);
    });

    test('stops once 1000 URLs were accepted', () => {
      const xml = urlset(Array.from({ length: 3000 }, (_, i) => ({ loc: `https://example.com/blog/post-${i}` })));
      const { entries, processed } = parseUrlset(xml, 'example.com');
      expect(entries).toHaveLength(1000);
      expect(processed).toBe(1000);
      expect(entries[999].url).toBe('https://example.com/blog/post-999');
    });
  });

  test('selectRecent orders dated entries newest first, undated after in order', () => {
    const urls = selectRecent([
      { url: 'a', lastmod: '2024-01-01' },
      { url: 'b' },
      { url: 'c', lastmod: '2024-03-01' },
      { url: 'd' },
      { url: 'e', lastmod: '2024-01-01' },
    ]);
    expect(urls).toEqual(['c', 'a', 'e', 'b', 'd']);
  });

  test('selectRecent caps the result', () => {
    const entries = Array.from({ length: 150 }, (_, i) => ({ url: `u${i}` }));
    expect(selectRecent(entries)).toHaveLength(100);
    expect(selectRecent(entries, 2)).toEqual(['u0', 'u1']);
  });

  test('recognises sitemap indexes and caps nested sitemaps at three', () => {
    const xml = sitemapIndex(['https://example.com/s1.xml', 'https://example.com/s2.xml', 'https://example.com/s3.xml', 'https://example.com/s4.xml']);
    expect(isSitemapIndex(xml)).toBe(true);
    expect(isSitemapIndex(urlset([{ loc: 'https://example.com/blog/a' }]))).toBe(false);
    expect(parseSitemapIndex(xml)).toEqual([
      'https://example.com/s1.xml',
      'https://example.com/s2.xml',
      'https://example.com/s3.xml',
    ]);
  });

  test('sitemapsFromRobots resolves Sitemap lines case-insensitively', () => {
    const robots = ['User-agent: *', 'Disallow: /admin', 'Sitemap: https://example.com/a.xml', 'sitemap: /b.xml'].join('\n');
    expect(sitemapsFromRobots(robots, 'https://example.com/')).toEqual([
      'https://example.com/a.xml',
      'https://example.com/b.xml',
    ]);
  });

  test('discover follows indexes and robots.txt, skipping failed probes', async () => {
    const http = new FakeHttp({
      'https://example.com/sitemap.xml': sitemapIndex(['https://example.com/sitemap-posts.xml']),
      'https://example.com/sitemap-posts.xml': urlset([
        { loc: 'https://example.com/blog/a', lastmod: '2024-01-01' },
        { loc: 'https://example.com/blog/b', lastmod: '2024-02-01' },
        { loc: 'https://example.com/about' },
      ]),
      'https://example.com/sitemap_index.xml': networkFailure(),
      'https://example.com/robots.txt': 'Sitemap: /sitemap.xml\nSitemap: /extra.xml',
      'https://example.com/extra.xml': urlset([{ loc: 'https://example.com/news/c' }]),
    });

    const urls = await sitemapSource.discover(discoveryContext(http));

    expect(urls).toEqual(['https://example.com/blog/b', 'https://example.com/blog/a', 'https://example.com/news/c']);
    expect(http.requests.filter(url => url === 'https://example.com/sitemap.xml')).toHaveLength(1);
  });

  test('discover yields nothing when no sitemap exists', async () => {
    const urls = await sitemapSource.discover(discoveryContext(new FakeHttp()));
    expect(urls).toEqual([]);
  });
});
