// CSS selectors for content filtering and targeting

export const MULTIMEDIA_SELECTORS =
  'img, video, audio, embed, object, iframe, svg, canvas, picture, source, track, map, area';

export const STYLE_SELECTORS = 'style, link[rel="stylesheet"]';

export const SCRIPT_SELECTORS = 'script, noscript';

export const FORM_SELECTORS =
  'input, select, option, optgroup, datalist, output, progress, meter, button, textarea, fieldset, legend, form';

export const TEMPLATE_SELECTORS = 'template, slot';

export const DEPRECATED_VISUAL_SELECTORS = 'marquee, frame, frameset, noframes, blink';

// Everything that never carries readable text. `<head>` stays so titles survive.
export const ALL_NON_TEXTUAL_SELECTORS = [
  MULTIMEDIA_SELECTORS,
  STYLE_SELECTORS,
  SCRIPT_SELECTORS,
  FORM_SELECTORS,
  TEMPLATE_SELECTORS,
  DEPRECATED_VISUAL_SELECTORS,
].join(', ');

export const NOISE_SELECTORS =
  'nav, aside, footer, dialog, .modal, .nav, .menu, .breadcrumb, .sidebar, .footer, .header, .promo, .subscribe, .cookie, .gdpr, .ad, .advertisement, .share, .social, .related, .comments';

export const PAGE_HEADER_SELECTORS = 'body > header, .site-header, .page-header, .masthead';

// Chrome stripped by the generic DOM strategy
export const LAYOUT_SELECTORS = 'script, style, noscript, nav, footer, header, aside';

// Semantic containers tried first, in priority order
export const SEMANTIC_CONTENT_TAGS = ['main', 'article'];

export const CONTENT_SELECTORS = [
  '[role="main"]',
  '.content',
  '.main-content',
  '.post-content',
  '.article-content',
  '.blog-content',
  '#content',
  '#main',
  '.entry-content',
  '.post-body',
];

export const POST_TITLE_SELECTORS = ['.entry-title', '.post-title', '.article-title'];

// Containers the boilerplate scorer considers
export const SCORABLE_CONTAINERS = 'article, main, section, div, td, body';
