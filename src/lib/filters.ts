import type { CharacterAppearance, CharacterTable, Scene, SceneCategory, TimeOfDay } from './scriptTypes';
import { TIMES_OF_DAY } from './scriptTypes';

export type SortOrder = 'ascending' | 'descending';

export type SceneSortKey = 'order' | 'heading' | 'location' | 'timeOfDay' | 'wordCount' | 'dialogueCount';

export type SceneFilters = {
  searchText?: string;
  category?: SceneCategory;
  timeOfDay?: TimeOfDay;
  location?: string;
  characters?: string[];     // keep scenes sharing at least one of these
  sortBy?: SceneSortKey;
  sortOrder?: SortOrder;
};

export type CharacterSortKey = 'name' | 'dialogueCount' | 'sceneCount' | 'firstAppearance' | 'lastAppearance';

export type CharacterFilters = {
  searchText?: string;
  hasDialogue?: boolean;
  sortBy?: CharacterSortKey;
  sortOrder?: SortOrder;
};

const contains = (haystack: string, needle: string) => haystack.toLowerCase().includes(needle.toLowerCase());

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

// Counts sort busiest first in ascending order, everything else natural order
function compareScenes(a: Scene, b: Scene, key: SceneSortKey): number {
  switch (key) {
    case 'order': return a.sceneNumber - b.sceneNumber;
    case 'heading': return compareText(a.heading, b.heading);
    case 'location': return compareText(a.location, b.location);
    case 'timeOfDay': return TIMES_OF_DAY.indexOf(a.timeOfDay) - TIMES_OF_DAY.indexOf(b.timeOfDay);
    case 'wordCount': return b.wordCount - a.wordCount;
    case 'dialogueCount': return b.dialogueLineCount - a.dialogueLineCount;
  }
}

function compareCharacters(a: CharacterAppearance, b: CharacterAppearance, key: CharacterSortKey): number {
  switch (key) {
    case 'name': return compareText(a.name, b.name);
    case 'dialogueCount': return b.dialogueCount - a.dialogueCount;
    case 'sceneCount': return b.sceneCount - a.sceneCount;
    case 'firstAppearance': return a.firstAppearanceLine - b.firstAppearanceLine;
    case 'lastAppearance': return a.lastAppearanceLine - b.lastAppearanceLine;
  }
}

export function filterScenes(scenes: Scene[], filters: SceneFilters = {}): Scene[] {
  let out = scenes.slice();

  const q = filters.searchText?.trim();
  if (q) {
    out = out.filter(s => contains(s.heading, q) || contains(s.content, q) || contains(s.location, q));
  }
  if (filters.category) out = out.filter(s => s.category === filters.category);
  if (filters.timeOfDay) out = out.filter(s => s.timeOfDay === filters.timeOfDay);

  const loc = filters.location?.trim();
  if (loc) out = out.filter(s => contains(s.location, loc));

  const wanted = filters.characters ?? [];
  if (wanted.length) out = out.filter(s => s.characters.some(c => wanted.includes(c)));

  const key = filters.sortBy ?? 'order';
  const dir = filters.sortOrder === 'descending' ? -1 : 1;
  return out.sort((a, b) => dir * compareScenes(a, b, key));
}

export function filterCharacters(characters: CharacterTable, filters: CharacterFilters = {}): CharacterAppearance[] {
  let out = Object.values(characters);

  const q = filters.searchText?.trim();
  if (q) out = out.filter(c => contains(c.name, q));
  if (filters.hasDialogue !== undefined) {
    out = out.filter(c => (c.dialogueCount > 0) === filters.hasDialogue);
  }

  const key = filters.sortBy ?? 'name';
  const dir = filters.sortOrder === 'descending' ? -1 : 1;
  return out.sort((a, b) => dir * compareCharacters(a, b, key));
}
