import type { Emphasis } from './scriptTypes';

const BOLD_ITALIC_RE = /\*\*[^*]+\*\*|__[^_]+__/;
const BOLD_RE = /\*[^*]+\*/;
const ITALIC_RE = /_[^_]+_/;

/** Line-level emphasis tag: bold-italic wins over bold, bold over italic. */
export function detectEmphasis(text: string): Emphasis | undefined {
  if (BOLD_ITALIC_RE.test(text)) return 'bold-italic';
  if (BOLD_RE.test(text)) return 'bold';
  if (ITALIC_RE.test(text)) return 'italic';
  return undefined;
}

export function stripEmphasis(text: string): string {
  return text
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/__([^_]+)__/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .replace(/_([^_]+)_/g, '$1');
}
