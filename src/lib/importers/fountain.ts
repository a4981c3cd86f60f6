import type { Element, ScreenplayParse } from '@/lib/scriptTypes';
import { parseScreenplay } from '@/lib/pipeline';
import { isSceneBoundary } from '@/lib/sceneSegmenter';

export type ScriptImport = {
  parse: ScreenplayParse;
  warnings: string[];
};

/** Data-quality notes for an import dialog; the parse itself never fails. */
export function importWarnings(elements: Element[]): string[] {
  const warnings: string[] = [];
  if (!elements.length) {
    warnings.push('No screenplay content found.');
    return warnings;
  }
  const first = elements[0];
  if (!isSceneBoundary(first)) {
    const heading = elements.find(isSceneBoundary);
    warnings.push(
      heading
        ? `Content before first scene heading detected near line ${first.lineNumber}; it is not part of any scene.`
        : 'No scene headings found; the script has no scenes.'
    );
  }
  return warnings;
}

/**
 * Fountain importer (dependency-free)
 * Runs the full pipeline over .fountain / .txt text.
 */
export async function importFountain(text: string): Promise<ScriptImport> {
  const parse = parseScreenplay(text || '');
  return Promise.resolve({ parse, warnings: importWarnings(parse.elements) });
}
