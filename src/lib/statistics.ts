import type { CharacterTable, Scene, SceneCategory, TimeOfDay } from './scriptTypes';
import { countWords } from './sceneSegmenter';
import { formatTime } from './time';

export type SceneRef = { sceneNumber: number; heading: string; wordCount: number };

export type SceneStatistics = {
  totalScenes: number;
  totalWordCount: number;
  totalDialogueLines: number;
  totalActionLines: number;
  averageSceneLength: number;       // words per scene
  longestScene: SceneRef | null;
  shortestScene: SceneRef | null;
  scenesByCategory: Record<SceneCategory, number>;
  scenesByTimeOfDay: Record<TimeOfDay, number>;
  scenesByLocation: Record<string, number>;
};

export type CharacterStatistics = {
  totalCharacters: number;
  charactersWithDialogue: number;
  totalDialogueCount: number;
  averageDialogueCount: number;
  mostActiveCharacter: string | null;
};

export type DocumentStatistics = {
  wordCount: number;
  characterCount: number;
  pageCount: number;
  estimatedRuntimeSec: number;
  estimatedRuntime: string;
};

export type DocumentStatisticsOptions = {
  wordsPerPage?: number;
  secondsPerPage?: number;
};

export type SceneSlot = {
  sceneNumber: number;
  heading: string;
  startSec: number;
  lengthSec: number;
};

function emptyCategoryCounts(): Record<SceneCategory, number> {
  return {
    interior: 0,
    exterior: 0,
    'interior-exterior': 0,
    montage: 0,
    flashback: 0,
    dream: 0,
    fantasy: 0,
    other: 0,
  };
}

function emptyTimeOfDayCounts(): Record<TimeOfDay, number> {
  return {
    DAY: 0,
    NIGHT: 0,
    MORNING: 0,
    AFTERNOON: 0,
    EVENING: 0,
    DAWN: 0,
    DUSK: 0,
    CONTINUOUS: 0,
    LATER: 0,
    'SAME TIME': 0,
  };
}

const toRef = (s: Scene): SceneRef => ({ sceneNumber: s.sceneNumber, heading: s.heading, wordCount: s.wordCount });

export function summarizeScenes(scenes: Scene[]): SceneStatistics {
  const totalWordCount = scenes.reduce((acc, s) => acc + s.wordCount, 0);

  // Ties keep the earlier scene
  let longest: Scene | null = null;
  let shortest: Scene | null = null;
  for (const s of scenes) {
    if (!longest || s.wordCount > longest.wordCount) longest = s;
    if (!shortest || s.wordCount < shortest.wordCount) shortest = s;
  }

  const scenesByCategory = emptyCategoryCounts();
  const scenesByTimeOfDay = emptyTimeOfDayCounts();
  const scenesByLocation: Record<string, number> = {};
  for (const s of scenes) {
    scenesByCategory[s.category] += 1;
    scenesByTimeOfDay[s.timeOfDay] += 1;
    scenesByLocation[s.location] = (scenesByLocation[s.location] ?? 0) + 1;
  }

  return {
    totalScenes: scenes.length,
    totalWordCount,
    totalDialogueLines: scenes.reduce((acc, s) => acc + s.dialogueLineCount, 0),
    totalActionLines: scenes.reduce((acc, s) => acc + s.actionLineCount, 0),
    averageSceneLength: scenes.length ? totalWordCount / scenes.length : 0,
    longestScene: longest ? toRef(longest) : null,
    shortestScene: shortest ? toRef(shortest) : null,
    scenesByCategory,
    scenesByTimeOfDay,
    scenesByLocation,
  };
}

export function summarizeCharacters(characters: CharacterTable): CharacterStatistics {
  const list = Object.values(characters);
  const totalDialogueCount = list.reduce((acc, c) => acc + c.dialogueCount, 0);

  let mostActive: string | null = null;
  let best = -1;
  for (const c of list) {
    if (c.dialogueCount > best) {
      best = c.dialogueCount;
      mostActive = c.name;
    }
  }

  return {
    totalCharacters: list.length,
    charactersWithDialogue: list.filter(c => c.dialogueCount > 0).length,
    totalDialogueCount,
    averageDialogueCount: list.length ? totalDialogueCount / list.length : 0,
    mostActiveCharacter: mostActive,
  };
}

/** Rough page and runtime figures for the raw document (one page ≈ one minute). */
export function documentStatistics(text: string, options: DocumentStatisticsOptions = {}): DocumentStatistics {
  const wordsPerPage = options.wordsPerPage ?? 250;
  const secondsPerPage = options.secondsPerPage ?? 60;
  const wordCount = countWords(text || '');
  const pageCount = Math.max(1, Math.floor(wordCount / wordsPerPage));
  const estimatedRuntimeSec = pageCount * secondsPerPage;
  return {
    wordCount,
    characterCount: (text || '').length,
    pageCount,
    estimatedRuntimeSec,
    estimatedRuntime: formatTime(estimatedRuntimeSec),
  };
}

/**
 * Estimate screen time for one scene (very rough but serviceable for layout):
 * - action: 2.0s per line
 * - dialogue: 1.5s per line
 * clamped to 10s..180s
 */
export function estimateSceneSeconds(scene: Scene): number {
  const est = scene.actionLineCount * 2.0 + scene.dialogueLineCount * 1.5;
  return Math.max(10, Math.min(est, 180));
}

/** Lay scenes out sequentially with a 1s gap between them. */
export function sceneTimeline(scenes: Scene[]): SceneSlot[] {
  const GAP = 1;
  let cursor = 0;
  return scenes.map(s => {
    const lengthSec = estimateSceneSeconds(s);
    const slot = { sceneNumber: s.sceneNumber, heading: s.heading, startSec: cursor, lengthSec };
    cursor += lengthSec + GAP;
    return slot;
  });
}
