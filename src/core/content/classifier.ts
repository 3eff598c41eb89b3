import { CONTENT_THRESHOLDS } from '../../config/constants';
import type { ContentType } from '../types';

const PLATFORM_TYPES: ReadonlyArray<[string, ContentType]> = [
  ['substack.com', 'blog'],
  ['medium.com', 'blog'],
  ['linkedin.com', 'linkedin_post'],
  ['reddit.com', 'reddit_comment'],
];

// Checked in order; the first keyword found in the URL or title decides
const KEYWORD_TYPES: ReadonlyArray<[ContentType, readonly string[]]> = [
  ['podcast_transcript', ['podcast', 'episode', 'transcript', 'audio', 'listen']],
  ['call_transcript', ['transcript', 'interview', 'conversation', 'call', 'recording']],
  ['book', ['book', 'chapter', 'manual', 'documentation', 'reference']],
  ['news', ['/news/', 'breaking', 'announcement', 'press-release', 'update']],
];

const TUTORIAL_PHRASES = [
  'step 1',
  'step one',
  'first step',
  'tutorial:',
  'how to',
  'walkthrough',
  'guide:',
  'instructions',
  'follow these steps',
];

const NUMBERED_STEP = /^[1-5]\./;
const STEP_SCAN_WORDS = 200;

function looksLikeTutorial(content: string): boolean {
  const lower = content.toLowerCase();
  const words = lower.split(/\s+/).filter(Boolean);
  if (words.length <= CONTENT_THRESHOLDS.TUTORIAL_MIN_WORDS) return false;

  const phraseHits = TUTORIAL_PHRASES.filter(phrase => lower.includes(phrase)).length;
  if (phraseHits >= 2) return true;

  const numberedSteps = words.slice(0, STEP_SCAN_WORDS).filter(word => NUMBERED_STEP.test(word)).length;
  return numberedSteps >= 3;
}

/** Deterministic content type from platform, then URL/title keywords, then body shape. */
export function classifyContent(url: string, title: string, content: string): ContentType {
  const urlLower = url.toLowerCase();
  const titleLower = title.toLowerCase();

  for (const [domain, type] of PLATFORM_TYPES) {
    if (urlLower.includes(domain)) return type;
  }

  for (const [type, keywords] of KEYWORD_TYPES) {
    if (keywords.some(keyword => urlLower.includes(keyword) || titleLower.includes(keyword))) {
      return type;
    }
  }

  return looksLikeTutorial(content) ? 'tutorial' : 'blog';
}
