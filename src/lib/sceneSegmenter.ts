import type { Element, ElementKind, Scene, SceneCategory, TimeOfDay } from './scriptTypes';
import { TIMES_OF_DAY } from './scriptTypes';
import { cueName, isNote, isParenthetical, isSceneHeading, isTransition } from './scriptParser';

const HEADING_SEPARATOR = ' - ';

const BUFFERED_KINDS: ReadonlySet<ElementKind> = new Set<ElementKind>([
  'action',
  'dialogue',
  'character-cue',
  'dual-dialogue-cue',
  'parenthetical',
  'transition',
  'note',
]);

// Checked in order against the uppercased heading; INT wins over the combined tokens.
const CATEGORY_TOKENS: Array<[SceneCategory, string[]]> = [
  ['interior', ['INT']],
  ['exterior', ['EXT']],
  ['interior-exterior', ['INT-EXT', 'INT/EXT', 'I/E', 'I-E']],
  ['montage', ['MONTAGE']],
  ['flashback', ['FLASHBACK']],
  ['dream', ['DREAM']],
  ['fantasy', ['FANTASY']],
];

export function isSceneBoundary(el: Element): boolean {
  return el.kind === 'scene-heading' || el.kind === 'forced-scene-heading';
}

function parseTimeOfDay(part: string): TimeOfDay {
  const up = part.toUpperCase();
  return TIMES_OF_DAY.find(t => up.includes(t)) ?? 'DAY';
}

function sceneCategory(heading: string): SceneCategory {
  const up = heading.toUpperCase();
  for (const [category, tokens] of CATEGORY_TOKENS) {
    if (tokens.some(tok => up.includes(tok))) return category;
  }
  return 'other';
}

export function parseSceneHeading(heading: string): {
  location: string;
  timeOfDay: TimeOfDay;
  category: SceneCategory;
} {
  const category = sceneCategory(heading);
  const at = heading.indexOf(HEADING_SEPARATOR);
  if (at === -1) {
    return { location: heading.trim(), timeOfDay: 'DAY', category };
  }
  return {
    location: heading.slice(0, at).trim(),
    timeOfDay: parseTimeOfDay(heading.slice(at + HEADING_SEPARATOR.length)),
    category,
  };
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Re-scan buffered lines with the classifier's heuristics:
 * - parentheticals, notes, headings and transitions are not counted
 * - a cue is not counted, but marks the lines after it as speech
 * - speech lines are dialogue, everything else is action
 * Cue elements count by kind as well: imported cues keep extensions such as
 * `(V.O.)` that the raw-line cue pattern rejects.
 */
function countLines(lines: Element[]): { dialogue: number; action: number } {
  let dialogue = 0;
  let action = 0;
  let speaking = false;
  for (const el of lines) {
    const t = el.raw.trim();
    if (!t) continue;
    if (isParenthetical(t) || isNote(t) || isSceneHeading(t) || isTransition(t)) continue;
    if (el.kind === 'character-cue' || el.kind === 'dual-dialogue-cue' || cueName(t) !== null) {
      speaking = true;
      continue;
    }
    if (speaking) dialogue++;
    else action++;
  }
  return { dialogue, action };
}

type OpenScene = {
  heading: Element;
  lines: Element[];
  characters: string[];
};

function finalizeScene(open: OpenScene, sceneNumber: number): Scene {
  const heading = open.heading.text;
  const content = open.lines.map(el => el.raw).join('\n');
  const { dialogue, action } = countLines(open.lines);
  return {
    sceneNumber,
    heading,
    lineNumber: open.heading.lineNumber,
    ...parseSceneHeading(heading),
    wordCount: countWords(content),
    dialogueLineCount: dialogue,
    actionLineCount: action,
    characters: open.characters,
    content,
  };
}

/**
 * Split the element stream at scene headings. Elements before the first
 * heading belong to no scene.
 */
export function segmentScenes(elements: Element[]): Scene[] {
  const scenes: Scene[] = [];
  let cur: OpenScene | null = null;

  const flushScene = () => {
    if (!cur) return;
    scenes.push(finalizeScene(cur, scenes.length + 1));
    cur = null;
  };

  for (const el of elements) {
    if (isSceneBoundary(el)) {
      flushScene();
      cur = { heading: el, lines: [], characters: [] };
      continue;
    }
    if (!cur || !BUFFERED_KINDS.has(el.kind)) continue;

    cur.lines.push(el);
    if (el.kind === 'character-cue' || el.kind === 'dual-dialogue-cue') {
      const name = el.text.trim();
      if (name && !cur.characters.includes(name)) cur.characters.push(name);
    }
  }
  flushScene();

  return scenes;
}

/** Scene whose span (heading up to the next heading) contains the given source line. */
export function findSceneAtLine(scenes: Scene[], lineNumber: number): Scene | null {
  let found: Scene | null = null;
  for (const s of scenes) {
    if (s.lineNumber > lineNumber) break;
    found = s;
  }
  return found;
}
