import type { ScreenplayParse } from './scriptTypes';
import { classifyScreenplay } from './scriptParser';
import { segmentScenes } from './sceneSegmenter';
import { extractCharacters } from './characterExtractor';

/**
 * Full reparse of a document: classify, then segment and extract over the
 * same element stream. Every call starts from scratch.
 */
export function parseScreenplay(text: string): ScreenplayParse {
  const { titlePage, elements } = classifyScreenplay(text);
  return {
    titlePage,
    elements,
    scenes: segmentScenes(elements),
    characters: extractCharacters(elements),
  };
}
