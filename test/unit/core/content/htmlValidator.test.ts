import { describe, test, expect } from '@jest/globals';
import { isPlausibleHtml } from '../../../../src/core/content/htmlValidator';
import { articlePage } from '../../../helpers/fakes';

const padding = (bytes: number): string => `<!-- ${'x'.repeat(bytes)} -->`;

describe('isPlausibleHtml', () => {
  test('accepts a server-rendered article page', () => {
    expect(isPlausibleHtml(articlePage({ title: 'Harbour' }))).toBe(true);
  });

  test('rejects bodies under 512 bytes', () => {
    expect(isPlausibleHtml('<html><body><p>a</p><p>b</p></body></html>')).toBe(false);
  });

  test('accepts a compact article page of short words', () => {
    const words = Array.from({ length: 150 }, (_, i) => ['sun', 'on', 'the', 'sea'][i % 4]).join(' ');
    const page = `<html><head><title>Harbour Co</title></head><body><article><h1>Pier</h1><p>${words}.</p></article></body></html>`;
    expect(isPlausibleHtml(page)).toBe(true);
  });

  test('rejects non-HTML bodies', () => {
    expect(isPlausibleHtml(`{"data": "${'x'.repeat(2000)}"}`)).toBe(false);
  });

  test('rejects pages with fewer than two content tags', () => {
    expect(isPlausibleHtml(`<html><body><p>one</p>${padding(1200)}</body></html>`)).toBe(false);
  });

  test('rejects script-heavy app shells', () => {
    const scripts = Array.from({ length: 8 }, (_, i) => `<script src="/chunk-${i}.js"></script>`).join('');
    const shell = `<html><body><div id="root"></div><div id="modal"></div>${scripts}${padding(1200)}</body></html>`;
    expect(isPlausibleHtml(shell)).toBe(false);
  });

  test('accepts when content tags outnumber half the scripts', () => {
    const scripts = Array.from({ length: 4 }, (_, i) => `<script src="/chunk-${i}.js"></script>`).join('');
    const page = `<html><body><div>a</div><p>b</p><p>c</p>${scripts}${padding(1200)}</body></html>`;
    expect(isPlausibleHtml(page)).toBe(true);
  });
});
