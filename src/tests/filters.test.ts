import { describe, it, expect } from 'vitest';
import { parseScreenplay } from '@/lib/pipeline';
import { filterCharacters, filterScenes } from '@/lib/filters';

const { scenes, characters } = parseScreenplay(
  [
    'INT. KITCHEN - NIGHT',
    'TOM',
    'Where is the key?',
    'EXT. GARDEN - DAY',
    'Anna digs in the soil near the old shed.',
    'INT. KITCHEN - MORNING',
    'ANNA',
    'Found it.',
    'TOM',
    'Finally.',
  ].join('\n')
);

const numbers = (list: { sceneNumber: number }[]) => list.map(s => s.sceneNumber);

describe('filterScenes', () => {
  it('keeps document order by default', () => {
    expect(numbers(filterScenes(scenes))).toEqual([1, 2, 3]);
  });

  it('searches heading, content and location case-insensitively', () => {
    expect(numbers(filterScenes(scenes, { searchText: 'KEY' }))).toEqual([1]);
    expect(numbers(filterScenes(scenes, { searchText: 'garden' }))).toEqual([2]);
  });

  it('filters by category, time of day, location and characters', () => {
    expect(numbers(filterScenes(scenes, { category: 'interior' }))).toEqual([1, 3]);
    expect(numbers(filterScenes(scenes, { timeOfDay: 'DAY' }))).toEqual([2]);
    expect(numbers(filterScenes(scenes, { location: 'kitchen' }))).toEqual([1, 3]);
    expect(numbers(filterScenes(scenes, { characters: ['ANNA'] }))).toEqual([3]);
  });

  it('sorts by the requested key and order', () => {
    expect(numbers(filterScenes(scenes, { sortBy: 'wordCount' }))).toEqual([2, 1, 3]);
    expect(numbers(filterScenes(scenes, { sortBy: 'order', sortOrder: 'descending' }))).toEqual([3, 2, 1]);
    expect(numbers(filterScenes(scenes, { sortBy: 'timeOfDay' }))).toEqual([2, 1, 3]);
    expect(numbers(filterScenes(scenes, { sortBy: 'dialogueCount' }))).toEqual([3, 1, 2]);
  });

  it('leaves the input untouched', () => {
    filterScenes(scenes, { sortBy: 'order', sortOrder: 'descending' });
    expect(numbers(scenes)).toEqual([1, 2, 3]);
  });
});

describe('filterCharacters', () => {
  const names = (list: { name: string }[]) => list.map(c => c.name);

  it('sorts by name by default', () => {
    expect(names(filterCharacters(characters))).toEqual(['ANNA', 'TOM']);
  });

  it('sorts by dialogue count', () => {
    expect(names(filterCharacters(characters, { sortBy: 'dialogueCount' }))).toEqual(['TOM', 'ANNA']);
  });

  it('filters by name and dialogue presence', () => {
    expect(names(filterCharacters(characters, { searchText: 'an' }))).toEqual(['ANNA']);
    expect(filterCharacters(characters, { hasDialogue: false })).toEqual([]);
  });
});
