export * from './lib/scriptTypes';
export { classifyScreenplay, splitLines } from './lib/scriptParser';
export { detectEmphasis, stripEmphasis } from './lib/emphasis';
export { segmentScenes, parseSceneHeading, findSceneAtLine, countWords } from './lib/sceneSegmenter';
export { extractCharacters, findSpeaker } from './lib/characterExtractor';
export { parseScreenplay } from './lib/pipeline';
export * from './lib/statistics';
export * from './lib/filters';
export * from './lib/storage';
export { elementsToFountain } from './lib/format/fountain';
export { importFountain, importWarnings, type ScriptImport } from './lib/importers/fountain';
export { importFdx } from './lib/importers/fdx';
export { formatTime } from './lib/time';
