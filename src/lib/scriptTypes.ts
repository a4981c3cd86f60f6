export type ElementKind =
  | 'scene-heading'         // INT. KITCHEN - NIGHT
  | 'forced-scene-heading'  // !INT. KITCHEN - NIGHT
  | 'action'                // Action/description (fallback)
  | 'forced-action'         // @Action that would otherwise parse as something else
  | 'character-cue'         // TOM
  | 'dual-dialogue-cue'     // SARAH^
  | 'dialogue'              // Lines spoken after a cue
  | 'parenthetical'         // (whispering)
  | 'transition'            // CUT TO:, FADE OUT
  | 'section'               // # Act One
  | 'synopsis'              // = She finds the key.
  | 'note'                  // [[check this]]
  | 'centered'              // > THE END <
  | 'page-break'            // ===
  | 'lyric';                // ~ la la la ~

export type Emphasis = 'bold' | 'italic' | 'bold-italic';

export type Element = {
  kind: ElementKind;
  text: string;            // trimmed content, markup delimiters stripped
  raw: string;             // physical line as written, without line terminator
  lineNumber: number;      // 1-based source line
  emphasis?: Emphasis;     // dialogue only
  sectionLevel?: number;   // sections only: length of the leading # run
};

export type TitlePage = Record<string, string>;

export type ClassifiedScript = {
  titlePage: TitlePage;
  elements: Element[];
};

export const SCENE_CATEGORIES = [
  'interior',
  'exterior',
  'interior-exterior',
  'montage',
  'flashback',
  'dream',
  'fantasy',
  'other',
] as const;
export type SceneCategory = (typeof SCENE_CATEGORIES)[number];

export const TIMES_OF_DAY = [
  'DAY',
  'NIGHT',
  'MORNING',
  'AFTERNOON',
  'EVENING',
  'DAWN',
  'DUSK',
  'CONTINUOUS',
  'LATER',
  'SAME TIME',
] as const;
export type TimeOfDay = (typeof TIMES_OF_DAY)[number];

export type Scene = {
  sceneNumber: number;        // 1-based order in the script
  heading: string;            // heading text (forced marker stripped)
  lineNumber: number;         // line of the heading element
  location: string;
  timeOfDay: TimeOfDay;
  category: SceneCategory;
  wordCount: number;
  dialogueLineCount: number;
  actionLineCount: number;
  characters: string[];       // distinct cue names, first appearance order
  content: string;            // buffered raw lines joined by \n
};

export type CharacterAppearance = {
  name: string;
  firstAppearanceLine: number;
  lastAppearanceLine: number;
  dialogueCount: number;
  sceneCount: number;
  scenes: string[];           // distinct scene headings the cue appeared under
};

export type CharacterTable = Record<string, CharacterAppearance>;

export type ScreenplayParse = ClassifiedScript & {
  scenes: Scene[];
  characters: CharacterTable;
};
