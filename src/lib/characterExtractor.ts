import type { CharacterAppearance, CharacterTable, Element } from './scriptTypes';
import { isSceneBoundary } from './sceneSegmenter';

function isCue(el: Element): boolean {
  return el.kind === 'character-cue' || el.kind === 'dual-dialogue-cue';
}

/**
 * Nearest cue before `elements[index]` by line number. The scan stops at a
 * scene heading, so a speaker never carries over into the next scene.
 */
export function findSpeaker(elements: Element[], index: number): string | null {
  const line = elements[index].lineNumber;
  for (let i = index - 1; i >= 0; i--) {
    const el = elements[i];
    if (el.lineNumber >= line) continue;
    if (isSceneBoundary(el)) return null;
    if (isCue(el)) return el.text.trim() || null;
  }
  return null;
}

type Tally = {
  first: number;
  last: number;
  dialogueCount: number;
  scenes: Set<string>;
};

export function extractCharacters(elements: Element[]): CharacterTable {
  const tallies = new Map<string, Tally>();
  let currentScene: string | null = null;

  for (let i = 0; i < elements.length; i++) {
    const el = elements[i];

    if (isSceneBoundary(el)) {
      currentScene = el.text;
      continue;
    }

    if (isCue(el)) {
      const name = el.text.trim();
      if (!name) continue;
      const tally = tallies.get(name);
      if (!tally) {
        const scenes = new Set<string>();
        if (currentScene !== null) scenes.add(currentScene);
        tallies.set(name, { first: el.lineNumber, last: el.lineNumber, dialogueCount: 0, scenes });
      } else {
        tally.last = el.lineNumber;
        if (currentScene !== null) tally.scenes.add(currentScene);
      }
      continue;
    }

    if (el.kind === 'dialogue') {
      // Dialogue with no cue before it is not attributed to anyone
      const speaker = findSpeaker(elements, i);
      const tally = speaker === null ? undefined : tallies.get(speaker);
      if (tally) tally.dialogueCount += 1;
    }
  }

  const entries: Array<[string, CharacterAppearance]> = [...tallies].map(([name, t]) => [
    name,
    {
      name,
      firstAppearanceLine: t.first,
      lastAppearanceLine: t.last,
      dialogueCount: t.dialogueCount,
      sceneCount: t.scenes.size,
      scenes: [...t.scenes],
    },
  ]);
  return Object.fromEntries(entries);
}
