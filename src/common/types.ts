export type ClipType = 'Video' | 'Audio' | 'Image' | 'Graphic' | 'Nested sequence' | 'Unknown';

export type MediaKind = 'Video' | 'Audio' | 'Image' | 'Graphic';

export type StockProvider = 'Imago' | 'Colourbox' | 'Artlist';

/** `ObjectRef` points into the ObjectID space, `ObjectURef` into the ObjectUID space */
export type RefSpace = 'id' | 'uid';

export interface ObjectRef {
  space: RefSpace,
  value: string,
}

export interface FrameRate {
  ticksPerFrame: number,
  fps: number,
  /** value shown to users, e.g. 23.976 */
  nominalFps: number,
  isFallback: boolean,
}

export interface SequenceSummary {
  id: string,
  name: string,
}

export type ExtractionWarningCode = 'dangling-reference' | 'frame-rate-fallback' | 'unrecognized-frame-rate';

export interface ExtractionWarning {
  code: ExtractionWarningCode,
  message: string,
}

export interface RawPlacement {
  name: string | undefined,
  startTicks: number,
  endTicks: number,
  trackIndex: number,
  isAudio: boolean,
  /** name of the nested sequence this placement was pulled from */
  sourceSequence?: string | undefined,
  sourcePath?: string | undefined,
  mediaKind?: MediaKind | undefined,
  isNestedContainer: boolean,
}

export interface ProviderMatch {
  source: StockProvider,
  mediaId: string,
  title?: string | undefined,
}

export interface ResolvedClipInstance {
  name: string,
  type: ClipType,
  startSeconds: number,
  endSeconds: number,
  startTc: string,
  endTc: string,
  trackIndex: number,
  isAudio: boolean,
  sourceSequence?: string | undefined,
  source?: StockProvider | undefined,
  mediaId?: string | undefined,
  title?: string | undefined,
  instanceCount: number,
}

export interface Interval {
  start: number,
  end: number,
}

export interface AggregatedClip {
  name: string,
  type: ClipType,
  sourceSequence?: string | undefined,
  instanceCount: number,
  /** sorted by start, pairwise non-overlapping, in unrounded seconds */
  intervals: Interval[],
  source?: StockProvider | undefined,
  mediaId?: string | undefined,
  title?: string | undefined,
}

export interface PerInstanceRow {
  name: string,
  type: ClipType,
  startTc: string,
  endTc: string,
  sourceSequence?: string | undefined,
  source?: StockProvider | undefined,
  mediaId?: string | undefined,
  title?: string | undefined,
  instanceCount: number,
}

export interface GroupedRow {
  name: string,
  type: ClipType,
  sourceSequence?: string | undefined,
  instanceCount: number,
  /** `start1-end1|start2-end2|...` */
  intervals: string,
  source?: StockProvider | undefined,
  mediaId?: string | undefined,
  title?: string | undefined,
}

export interface VisualizationItem extends PerInstanceRow {
  startSeconds: number,
  endSeconds: number,
  track: number,
  isAudio: boolean,
}

export interface VisualizationPayload {
  durationSeconds: number,
  frameRate: number,
  items: VisualizationItem[],
}
