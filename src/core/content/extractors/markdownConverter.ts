import TurndownService from 'turndown';

const HEADING_TAGS: TurndownService.Filter = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

/**
 * HTML to Markdown converter tuned for paragraph chunking: block elements are
 * separated by blank lines, so `\n\n` is always a safe split point.
 */
export class MarkdownConverter {
  private turndownService: TurndownService;

  constructor() {
    this.turndownService = new TurndownService({
      headingStyle: 'atx',
      hr: '---',
      bulletListMarker: '-',
      codeBlockStyle: 'fenced',
      fence: '```',
      emDelimiter: '*',
      strongDelimiter: '**',
      linkStyle: 'inlined',
      preformattedCode: true,
    });

    this.configureRules();
  }

  private configureRules(): void {
    this.turndownService.addRule('headings-with-hierarchy', {
      filter: HEADING_TAGS,
      replacement: (content, node) => {
        const level = Number.parseInt(node.nodeName.charAt(1), 10) || 1;
        const text = content.replace(/\s+/g, ' ').trim();
        return text ? `\n\n${'#'.repeat(level)} ${text}\n\n` : '';
      },
    });

    this.turndownService.addRule('paragraphs-with-spacing', {
      filter: 'p',
      replacement: content => `\n\n${content.trim()}\n\n`,
    });

    this.turndownService.addRule('code-blocks', {
      filter: 'pre',
      replacement: (_content, node) => {
        const code = node.textContent ?? '';
        return `\n\n\`\`\`${detectLanguage(node)}\n${code}\n\`\`\`\n\n`;
      },
    });

    this.turndownService.addRule('enhanced-lists', {
      filter: ['ul', 'ol'],
      replacement: content => `\n\n${content.trim()}\n\n`,
    });

    this.turndownService.addRule('blockquotes', {
      filter: 'blockquote',
      replacement: content => `\n\n> ${content.trim().replace(/\n/g, '\n> ')}\n\n`,
    });

    this.turndownService.addRule('remove-noise', {
      filter: ['script', 'style', 'nav', 'aside', 'footer', 'noscript'],
      replacement: () => '',
    });
  }

  convertToMarkdown(html: string): string {
    return postProcessMarkdown(this.turndownService.turndown(html));
  }
}

function classNameOf(node: Node | null): string {
  return node && 'className' in node && typeof node.className === 'string' ? node.className : '';
}

function detectLanguage(node: Node): string {
  const className = classNameOf(node) || classNameOf(node.firstChild);
  const langMatch = /(?:language-|lang-|highlight-)([a-zA-Z0-9]+)/.exec(className);
  return langMatch ? langMatch[1] : '';
}

function postProcessMarkdown(markdown: string): string {
  return (
    markdown
      // Collapse runs of blank lines to a single paragraph break
      .replace(/\n{3,}/g, '\n\n')
      .replace(/([^\n])\n(#{1,6} )/g, '$1\n\n$2')
      .trim()
  );
}

export const markdownConverter = new MarkdownConverter();
