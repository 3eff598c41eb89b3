import { HTML_VALIDITY } from '../../config/constants';

const CONTENT_TAG = /<(p|div|article|main|section|h1|h2|h3)[\s>]/gi;
const SCRIPT_TAG = /<script[\s>]/gi;

function countMatches(input: string, pattern: RegExp): number {
  return (input.match(pattern) ?? []).length;
}

/**
 * Whether a fetched body is real, server-rendered HTML worth extracting from, as
 * opposed to an error stub or a script-only app shell.
 */
export function isPlausibleHtml(body: string): boolean {
  if (Buffer.byteLength(body, 'utf8') < HTML_VALIDITY.MIN_BYTES) return false;

  const lower = body.toLowerCase();
  if (!lower.includes('<html') && !lower.includes('<body')) return false;

  const contentTags = countMatches(body, CONTENT_TAG);
  if (contentTags < HTML_VALIDITY.MIN_CONTENT_TAGS) return false;

  return contentTags > countMatches(body, SCRIPT_TAG) / 2;
}
