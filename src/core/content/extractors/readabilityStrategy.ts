import { Readability } from '@mozilla/readability';
import { JSDOM, VirtualConsole } from 'jsdom';
import { ALL_NON_TEXTUAL_SELECTORS } from './selectors';
import { markdownConverter } from './markdownConverter';
import { defineStrategy } from './strategy';

const CHAR_THRESHOLD = 500;

export const readabilityStrategy = defineStrategy('readability', (url, html) => {
  // A bare VirtualConsole keeps jsdom's stylesheet parse errors off stderr
  const dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
  const { document } = dom.window;

  try {
    const pageTitle = document.querySelector('title')?.textContent?.trim() || undefined;
    document.querySelectorAll(ALL_NON_TEXTUAL_SELECTORS).forEach(element => element.remove());

    const article = new Readability(document, {
      charThreshold: CHAR_THRESHOLD,
      classesToPreserve: ['caption', 'credits'],
    }).parse();
    if (!article || !article.content) return null;

    return {
      markdown: markdownConverter.convertToMarkdown(article.content),
      metadataTitle: article.title || undefined,
      pageTitle,
    };
  } finally {
    dom.window.close();
  }
});
