import type { ClassifiedScript, Element, ElementKind, TitlePage } from './scriptTypes';
import { detectEmphasis } from './emphasis';

// Scene heading token: INT., EXT., INT./EXT., INT/EXT, INT-EXT, I/E, I-E (case-insensitive),
// followed by whitespace and a location
const HEADING_TOKEN = String.raw`(?:INT\.?\/EXT|INT-EXT|I\/E|I-E|INT|EXT)\.?\s+\S`;
const SCENE_RE = new RegExp(`^${HEADING_TOKEN}`, 'i');
const FORCED_SCENE_RE = new RegExp(`^!${HEADING_TOKEN}`, 'i');
// Transition: closed vocabulary at line start, trailing text allowed (CUT TO:, FADE OUT.)
const TRANSITION_RE =
  /^(?:FADE TO BLACK|FADE OUT|FADE IN|CUT TO BLACK|CUT TO|SMASH CUT TO|JUMP CUT TO|MATCH CUT TO|DISSOLVE TO|THE END|END)(?![A-Za-z])/;
const PAGE_BREAK_RE = /^={3,}$/;
const LYRIC_RE = /^~(.*)~$/;
const CENTERED_RE = /^>\s*(.*?)\s*<$/;
const NOTE_RE = /^\[\[(.*)\]\]$/;
const SYNOPSIS_RE = /^=\s+(.*)$/;
const SECTION_RE = /^(#+)\s+(.*)$/;
// Character cue: uppercase letters and spaces, starting with a letter
const CUE_RE = /^[A-Z][A-Z\s]*$/;
const DUAL_CUE_RE = /^([A-Z][A-Z\s]*)\^$/;
const PAREN_RE = /^\((.*)\)$/;

export function isSceneHeading(line: string): boolean {
  return SCENE_RE.test(line.trim());
}

export function isForcedSceneHeading(line: string): boolean {
  return FORCED_SCENE_RE.test(line.trim());
}

export function isTransition(line: string): boolean {
  return TRANSITION_RE.test(line.trim());
}

export function isParenthetical(line: string): boolean {
  return PAREN_RE.test(line.trim());
}

export function isNote(line: string): boolean {
  return NOTE_RE.test(line.trim());
}

/** Name carried by a plain or dual-dialogue cue line, or null when the line is not a cue. */
export function cueName(line: string): string | null {
  const t = line.trim();
  const dual = DUAL_CUE_RE.exec(t);
  if (dual) return dual[1].trim();
  return CUE_RE.test(t) ? t : null;
}

type Classified = { kind: ElementKind; text: string; sectionLevel?: number };
type LineRule = (line: string) => Classified | null;

/**
 * Precedence ladder, first match wins. Several patterns are prefix/suffix
 * variants of each other (`=== ` vs `= `, `SARAH^` vs `SARAH`), so order matters.
 * Dialogue and action are resolved after the ladder since they depend on the pending cue.
 */
const LINE_RULES: LineRule[] = [
  t => (PAGE_BREAK_RE.test(t) ? { kind: 'page-break', text: '' } : null),
  t => (FORCED_SCENE_RE.test(t) ? { kind: 'forced-scene-heading', text: t.slice(1).trim() } : null),
  t => (t.startsWith('@') ? { kind: 'forced-action', text: t.slice(1).trim() } : null),
  t => {
    const m = LYRIC_RE.exec(t);
    return m ? { kind: 'lyric', text: m[1].trim() } : null;
  },
  t => {
    const m = CENTERED_RE.exec(t);
    return m ? { kind: 'centered', text: m[1] } : null;
  },
  t => {
    const m = NOTE_RE.exec(t);
    return m ? { kind: 'note', text: m[1].trim() } : null;
  },
  t => {
    const m = SYNOPSIS_RE.exec(t);
    return m ? { kind: 'synopsis', text: m[1].trim() } : null;
  },
  t => {
    const m = SECTION_RE.exec(t);
    return m ? { kind: 'section', text: m[2].trim(), sectionLevel: m[1].length } : null;
  },
  t => (TRANSITION_RE.test(t) ? { kind: 'transition', text: t } : null),
  t => (SCENE_RE.test(t) ? { kind: 'scene-heading', text: t } : null),
  t => {
    const m = DUAL_CUE_RE.exec(t);
    return m ? { kind: 'dual-dialogue-cue', text: m[1].trim() } : null;
  },
  t => {
    const m = PAREN_RE.exec(t);
    return m ? { kind: 'parenthetical', text: m[1].trim() } : null;
  },
  t => (CUE_RE.test(t) ? { kind: 'character-cue', text: t } : null),
];

function parseTitlePageLine(line: string): { key: string; value: string } | null {
  const colon = line.indexOf(':');
  if (colon === -1) return null;
  return { key: line.slice(0, colon).trim(), value: line.slice(colon + 1).trim() };
}

export function splitLines(text: string): string[] {
  return text.replace(/\r\n?/g, '\n').split('\n');
}

/**
 * Single pass over the document: title page block first, then one Element per
 * non-blank line. Never throws; anything unrecognized becomes action.
 */
export function classifyScreenplay(text: string): ClassifiedScript {
  const rawLines = splitLines(text || '');
  const titleEntries = new Map<string, string>();
  const elements: Element[] = [];

  let inTitlePage = true;
  let pendingCue: string | null = null;

  for (let i = 0; i < rawLines.length; i++) {
    const raw = rawLines[i];
    const t = raw.trim();
    if (!t) continue;

    if (inTitlePage) {
      if (t === ':') {
        inTitlePage = false;
        continue;
      }
      const entry = parseTitlePageLine(t);
      if (entry) {
        titleEntries.set(entry.key, entry.value);
        continue;
      }
      // First line that is not metadata is the first body line
      inTitlePage = false;
    }

    const lineNumber = i + 1;
    let hit: Classified | null = null;
    for (const rule of LINE_RULES) {
      hit = rule(t);
      if (hit) break;
    }

    if (hit) {
      if (hit.kind === 'character-cue' || hit.kind === 'dual-dialogue-cue') pendingCue = hit.text;
      // A new scene has no speaker yet
      if (hit.kind === 'scene-heading' || hit.kind === 'forced-scene-heading') pendingCue = null;

      const el: Element = { kind: hit.kind, text: hit.text, raw, lineNumber };
      if (hit.sectionLevel !== undefined) el.sectionLevel = hit.sectionLevel;
      elements.push(el);
      continue;
    }

    if (pendingCue !== null) {
      const el: Element = { kind: 'dialogue', text: t, raw, lineNumber };
      const emphasis = detectEmphasis(t);
      if (emphasis) el.emphasis = emphasis;
      elements.push(el);
      continue;
    }

    elements.push({ kind: 'action', text: t, raw, lineNumber });
  }

  // Built from entries so a `__proto__` key stays an ordinary key
  const titlePage: TitlePage = Object.fromEntries(titleEntries);
  return { titlePage, elements };
}
