// src/lib/format/fountain.ts
// Plain-text re-emitter for a classified script.

import type { ClassifiedScript } from '@/lib/scriptTypes';

/**
 * Convert a title page + Element[] back to screenplay text.
 * Each element is written from its raw line, so markers (!, @, ^, ~, [[ ]]) survive.
 * Spacing rules:
 * - title page -> "Key: Value" lines closed by a ":" line
 * - scene headings, transitions, page breaks -> blank line before and after
 * - character cues -> blank line before; parentheticals and dialogue follow directly
 * - everything else -> paragraph followed by a blank line
 * Re-classifying the output yields the same element kinds in the same order.
 */
export function elementsToFountain(script: ClassifiedScript): string {
  const out: string[] = [];

  const pushBlankOnce = () => {
    if (out.length && out[out.length - 1] !== '') out.push('');
  };

  const titleEntries = Object.entries(script.titlePage);
  const firstLine = script.elements[0]?.raw.trim() ?? '';
  // A leading body line with a colon would otherwise be read back as metadata
  if (titleEntries.length || firstLine.includes(':')) {
    for (const [key, value] of titleEntries) out.push(`${key}: ${value}`);
    out.push(':');
    pushBlankOnce();
  }

  for (const el of script.elements) {
    const line = el.raw.trim();

    switch (el.kind) {
      case 'scene-heading':
      case 'forced-scene-heading':
      case 'transition':
      case 'page-break':
        pushBlankOnce();
        out.push(line);
        pushBlankOnce();
        break;
      case 'character-cue':
      case 'dual-dialogue-cue':
        pushBlankOnce();
        out.push(line);
        break;
      case 'parenthetical':
      case 'dialogue':
        out.push(line);
        break;
      default:
        // Dialogue block ends at the first paragraph after it
        pushBlankOnce();
        out.push(line);
        pushBlankOnce();
        break;
    }
  }

  // Trim trailing blanks
  while (out.length && out[out.length - 1] === '') out.pop();
  return out.join('\n');
}
