import { z } from 'zod';
import type { CharacterTable, Scene, TitlePage } from './scriptTypes';
import { SCENE_CATEGORIES, TIMES_OF_DAY } from './scriptTypes';

export const SNAPSHOT_VERSION = 1;

const sceneSchema = z.object({
  sceneNumber: z.number().int().positive(),
  heading: z.string(),
  lineNumber: z.number().int().positive(),
  location: z.string(),
  timeOfDay: z.enum(TIMES_OF_DAY),
  category: z.enum(SCENE_CATEGORIES),
  wordCount: z.number().int().nonnegative(),
  dialogueLineCount: z.number().int().nonnegative(),
  actionLineCount: z.number().int().nonnegative(),
  characters: z.array(z.string()),
  content: z.string(),
});

const characterSchema = z.object({
  name: z.string(),
  firstAppearanceLine: z.number().int().positive(),
  lastAppearanceLine: z.number().int().positive(),
  dialogueCount: z.number().int().nonnegative(),
  sceneCount: z.number().int().nonnegative(),
  scenes: z.array(z.string()),
});

export const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  savedAt: z.string(),
  titlePage: z.record(z.string(), z.string()),
  scenes: z.array(sceneSchema),
  characters: z.record(z.string(), characterSchema),
});

export type ScreenplaySnapshot = {
  version: typeof SNAPSHOT_VERSION;
  savedAt: string;                 // ISO timestamp
  titlePage: TitlePage;
  scenes: Scene[];
  characters: CharacterTable;
};

export type SaveResult = { ok: true; savedAt: string } | { ok: false; error: string };
export type ImportResult = { ok: true; snapshot: ScreenplaySnapshot } | { ok: false; error: string };

/** Storage seam injected by the caller; the pipeline never persists anything on its own. */
export interface ScreenplayStore {
  save(snapshot: ScreenplaySnapshot): Promise<SaveResult>;
  load(): Promise<ScreenplaySnapshot | null>;
}

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreError';
  }
}

export function createSnapshot(
  parse: { titlePage: TitlePage; scenes: Scene[]; characters: CharacterTable },
  now: Date = new Date()
): ScreenplaySnapshot {
  return {
    version: SNAPSHOT_VERSION,
    savedAt: now.toISOString(),
    titlePage: { ...parse.titlePage },
    scenes: parse.scenes,
    characters: parse.characters,
  };
}

export function exportSnapshot(snapshot: ScreenplaySnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

function describeIssues(err: z.ZodError): string {
  return err.issues
    .map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

export function importSnapshot(json: string): ImportResult {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    return { ok: false, error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: `Invalid snapshot: ${describeIssues(parsed.error)}` };
  }
  return { ok: true, snapshot: parsed.data };
}

export type MemoryStoreOptions = {
  strict?: boolean;   // throw StoreError on corrupt data instead of logging and returning null
};

/**
 * In-process store that keeps the serialized JSON, so every load goes
 * through the same validation as an import.
 */
export class MemoryScreenplayStore implements ScreenplayStore {
  private data: string | null = null;
  private readonly strict: boolean;

  constructor(options: MemoryStoreOptions = {}) {
    this.strict = options.strict ?? false;
  }

  async save(snapshot: ScreenplaySnapshot): Promise<SaveResult> {
    const checked = snapshotSchema.safeParse(snapshot);
    if (!checked.success) {
      return { ok: false, error: `Invalid snapshot: ${describeIssues(checked.error)}` };
    }
    this.data = exportSnapshot(snapshot);
    return { ok: true, savedAt: snapshot.savedAt };
  }

  async load(): Promise<ScreenplaySnapshot | null> {
    if (this.data === null) return null;
    const res = importSnapshot(this.data);
    if (res.ok) return res.snapshot;
    if (this.strict) throw new StoreError(res.error);
    console.error('[Store] Failed to load snapshot:', res.error);
    return null;
  }

  /** Raw serialized payload, as another backend would hold it. */
  dump(): string | null {
    return this.data;
  }

  restore(raw: string): void {
    this.data = raw;
  }
}
