import { stringify } from 'csv-stringify/sync';
import maxBy from 'lodash/maxBy.js';

import type { AggregatedClip, FrameRate, GroupedRow, Interval, PerInstanceRow, ResolvedClipInstance, VisualizationPayload } from '../common/types.js';
import { intervalSeparator } from '../common/constants.js';
import { secondsToTimecode } from './timecode.js';


export const perInstanceCsvHeaders = ['clip_name', 'startTC', 'endTC', 'clip_type', 'source_sequence', 'source', 'media_id', 'source_title', 'instance_count'];

export const groupedCsvHeaders = ['clip_name', 'clip_type', 'source_sequence', 'instances_count', 'instances', 'source', 'media_id', 'source_title'];

export const formatInterval = ({ start, end }: Interval) => `${secondsToTimecode(start)}-${secondsToTimecode(end)}`;

export const formatIntervals = (intervals: Interval[]) => intervals.map(formatInterval).join(intervalSeparator);

const toPerInstanceRow = ({ name, type, startTc, endTc, sourceSequence, source, mediaId, title, instanceCount }: ResolvedClipInstance): PerInstanceRow => ({
  name, type, startTc, endTc, sourceSequence, source, mediaId, title, instanceCount,
});

export const toPerInstanceRows = (instances: ResolvedClipInstance[]) => instances.map(toPerInstanceRow);

export function toGroupedRows(clips: AggregatedClip[]): GroupedRow[] {
  return clips.map(({ name, type, sourceSequence, instanceCount, intervals, source, mediaId, title }) => ({
    name, type, sourceSequence, instanceCount, intervals: formatIntervals(intervals), source, mediaId, title,
  }));
}

const toCsv = (headers: string[], rows: (string | number | undefined)[][]) => stringify([headers, ...rows]);

export function formatPerInstanceCsv(rows: PerInstanceRow[]) {
  return toCsv(perInstanceCsvHeaders, rows.map((row) => [row.name, row.startTc, row.endTc, row.type, row.sourceSequence, row.source, row.mediaId, row.title, row.instanceCount]));
}

export function formatGroupedCsv(rows: GroupedRow[]) {
  return toCsv(groupedCsvHeaders, rows.map((row) => [row.name, row.type, row.sourceSequence, row.instanceCount, row.intervals, row.source, row.mediaId, row.title]));
}

export function buildVisualizationPayload(instances: ResolvedClipInstance[], frameRate: FrameRate): VisualizationPayload {
  return {
    durationSeconds: maxBy(instances, (instance) => instance.endSeconds)?.endSeconds ?? 0,
    frameRate: frameRate.nominalFps,
    items: instances.map((instance) => ({
      ...toPerInstanceRow(instance),
      startSeconds: instance.startSeconds,
      endSeconds: instance.endSeconds,
      track: instance.trackIndex,
      isAudio: instance.isAudio,
    })),
  };
}
