import { XMLParser } from 'fast-xml-parser';
import type { Element, ElementKind, Emphasis, TitlePage } from '@/lib/scriptTypes';
import { segmentScenes } from '@/lib/sceneSegmenter';
import { extractCharacters } from '@/lib/characterExtractor';
import { importWarnings, type ScriptImport } from '@/lib/importers/fountain';

type XmlNode = Record<string, unknown>;

function isNode(x: unknown): x is XmlNode {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function asArray(x: unknown): unknown[] {
  if (x == null) return [];
  return Array.isArray(x) ? x : [x];
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

function coerceText(x: unknown): string {
  if (x == null) return '';
  if (typeof x === 'string') return x;
  if (typeof x === 'number' || typeof x === 'boolean') return String(x);
  // Some FDX text is { '#text': '...', Style: 'Bold' }
  if (isNode(x)) return coerceText(x['#text']);
  return '';
}

function paragraphText(p: unknown): string {
  return asArray(child(p, 'Text')).map(coerceText).join('').replace(/\s+/g, ' ').trim();
}

function paragraphEmphasis(p: unknown): Emphasis | undefined {
  let bold = false;
  let italic = false;
  for (const run of asArray(child(p, 'Text'))) {
    const style = coerceText(child(run, 'Style'));
    if (/Bold/.test(style)) bold = true;
    if (/Italic/.test(style)) italic = true;
  }
  if (bold && italic) return 'bold-italic';
  if (bold) return 'bold';
  if (italic) return 'italic';
  return undefined;
}

function toKindFromFDX(elemType: string): ElementKind {
  // Map FDX paragraph types to our kinds
  switch (elemType) {
    case 'Scene Heading': return 'scene-heading';
    case 'Character': return 'character-cue';
    case 'Parenthetical': return 'parenthetical';
    case 'Dialogue': return 'dialogue';
    case 'Transition': return 'transition';
    default: return 'action';
  }
}

/** Fountain-equivalent source line, so raw-based consumers (scene content, export) stay consistent. */
function rawFor(kind: ElementKind, text: string): string {
  switch (kind) {
    case 'parenthetical': return `(${text})`;
    case 'dual-dialogue-cue': return `${text.toUpperCase()} ^`;
    case 'character-cue':
    case 'scene-heading':
    case 'transition':
      return text.toUpperCase();
    default: return text;
  }
}

/** Paragraph list with <DualDialogue> groups flattened; the second cue in a group is the dual one. */
function flattenParagraphs(list: unknown[]): Array<{ p: unknown; dual: boolean }> {
  const out: Array<{ p: unknown; dual: boolean }> = [];
  for (const p of list) {
    const group = child(p, 'DualDialogue');
    if (group === undefined) {
      out.push({ p, dual: false });
      continue;
    }
    let cues = 0;
    for (const inner of asArray(child(group, 'Paragraph'))) {
      const isCue = coerceText(child(inner, 'Type')) === 'Character';
      if (isCue) cues += 1;
      out.push({ p: inner, dual: isCue && cues > 1 });
    }
  }
  return out;
}

function parseTitlePage(fd: XmlNode): TitlePage {
  const entries = new Map<string, string>();
  const paragraphs = asArray(child(child(fd.TitlePage, 'Content'), 'Paragraph'));
  let expectAuthor = false;
  for (const p of paragraphs) {
    const text = paragraphText(p);
    if (!text) continue;
    const colon = text.indexOf(':');
    if (colon > 0) {
      entries.set(text.slice(0, colon).trim(), text.slice(colon + 1).trim());
    } else if (/^(written\s+)?by$/i.test(text)) {
      expectAuthor = true;
    } else if (expectAuthor) {
      entries.set('Author', text);
      expectAuthor = false;
    } else if (!entries.has('Title')) {
      entries.set('Title', text);
    }
  }
  return Object.fromEntries(entries);
}

function emptyImport(warning: string): ScriptImport {
  return {
    parse: { titlePage: {}, elements: [], scenes: [], characters: {} },
    warnings: [warning],
  };
}

/**
 * Final Draft (.fdx) importer. Paragraph types are explicit in the XML, so
 * there is no line classification; the resulting elements go through the same
 * segmenter and extractor as Fountain text.
 */
export function importFdx(xml: string): ScriptImport {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: '#text',
    // Runs are joined as-is; paragraphText trims the whole line
    trimValues: false,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: name => name === 'Paragraph' || name === 'Text',
  });

  let json: unknown;
  try {
    json = parser.parse(xml || '');
  } catch (err) {
    console.warn('[FDX Import] XML parse failed:', err);
    return emptyImport(`Could not read .fdx XML: ${err instanceof Error ? err.message : String(err)}`);
  }
  const fd = child(json, 'FinalDraft');
  if (!isNode(fd)) {
    const msg = 'Not a valid .fdx file (no <FinalDraft> root).';
    console.warn(`[FDX Import] ${msg}`);
    return emptyImport(msg);
  }

  const elements: Element[] = [];
  for (const { p, dual } of flattenParagraphs(asArray(child(fd.Content, 'Paragraph')))) {
    const text = paragraphText(p);
    if (!text) continue;

    let kind = toKindFromFDX(coerceText(child(p, 'Type')) || 'Action');
    let body = text;
    if (kind === 'character-cue' && (dual || body.endsWith('^'))) {
      kind = 'dual-dialogue-cue';
      body = body.replace(/\^$/, '').trim();
    }
    if (kind === 'parenthetical') body = body.replace(/^\(|\)$/g, '').trim();

    const el: Element = { kind, text: body, raw: rawFor(kind, body), lineNumber: elements.length + 1 };
    if (kind === 'dialogue') {
      const emphasis = paragraphEmphasis(p);
      if (emphasis) el.emphasis = emphasis;
    }
    elements.push(el);
  }

  const titlePage = parseTitlePage(fd);
  return {
    parse: {
      titlePage,
      elements,
      scenes: segmentScenes(elements),
      characters: extractCharacters(elements),
    },
    warnings: importWarnings(elements),
  };
}
