export type * from './common/types.js';
export { premiereTicksPerSecond, defaultFps } from './common/constants.js';

export { createConfig, defaultConfig, extractorConfigSchema, loadConfig, type ExtractorConfig } from './main/config.js';
export { CorruptProjectError, CyclicNestingError, DanglingReferenceError, SequenceNotFoundError, UnsupportedFormatError } from './main/errors.js';
export { decodeProjectBytes, loadProjectFile, loadProjectGraph, parseProjectXml } from './main/projectFile.js';
export { findSequence, listSequences, ProjectGraph, type ObjectNode } from './main/projectGraph.js';
export { walkSequence, type SequenceWalk } from './main/sequenceWalker.js';
export { resolveFrameRate, secondsToTimecode, ticksToSeconds, timecodeToSeconds } from './main/timecode.js';
export { detectClipType } from './main/clipType.js';
export { defaultProviderRegistry, recognizeSource, type ProviderPattern } from './main/sourceProviders.js';
export { aggregate, deduplicateInstances, mergeIntervals } from './main/aggregate.js';
export { buildVisualizationPayload, formatGroupedCsv, formatPerInstanceCsv, toGroupedRows, toPerInstanceRows } from './main/exportFormats.js';
export { extractTimeline, extractTimelineFromFile, listProjectSequences, type ExtractOptions, type ProjectInput, type TimelineExtraction } from './main/extract.js';
