import groupBy from 'lodash/groupBy.js';
import sortBy from 'lodash/sortBy.js';

import type { AggregatedClip, Interval, ResolvedClipInstance } from '../common/types.js';


const instanceKey = ({ name, sourceSequence, startTc, endTc }: ResolvedClipInstance) => JSON.stringify([name, sourceSequence ?? null, startTc, endTc]);

const clipKey = ({ name, sourceSequence, type }: ResolvedClipInstance) => JSON.stringify([name, sourceSequence ?? null, type]);

/**
 * Collapses instances with the same name, parent sequence and rounded timecodes into the first one seen,
 * summing their counts. Applying it twice gives the same result.
 */
export function deduplicateInstances(instances: ResolvedClipInstance[]) {
  const byKey = new Map<string, ResolvedClipInstance>();
  instances.forEach((instance) => {
    const key = instanceKey(instance);
    const existing = byKey.get(key);
    if (existing == null) byKey.set(key, { ...instance });
    else existing.instanceCount += instance.instanceCount;
  });
  return [...byKey.values()];
}

/** Joins overlapping and touching intervals. The result is sorted and does not depend on input order */
export function mergeIntervals(intervals: Interval[]): Interval[] {
  const merged: Interval[] = [];
  sortBy(intervals, [(interval) => interval.start, (interval) => interval.end]).forEach(({ start, end }) => {
    const last = merged.at(-1);
    if (last != null && start <= last.end) {
      last.end = Math.max(last.end, end);
    } else {
      merged.push({ start, end });
    }
  });
  return merged;
}

export function groupInstances(instances: ResolvedClipInstance[]): AggregatedClip[] {
  const groups = groupBy(instances.filter((instance) => instance.type !== 'Nested sequence'), clipKey);

  const clips = Object.values(groups).flatMap((members): AggregatedClip[] => {
    const [first] = members;
    if (first == null) return [];
    return [{
      name: first.name,
      type: first.type,
      sourceSequence: first.sourceSequence,
      instanceCount: members.length,
      intervals: mergeIntervals(members.map(({ startSeconds, endSeconds }) => ({ start: startSeconds, end: endSeconds }))),
      source: first.source,
      mediaId: first.mediaId,
      title: first.title,
    }];
  });

  return sortBy(clips, [(clip) => clip.intervals[0]?.start ?? 0, (clip) => clip.name]);
}

export function aggregate(instances: ResolvedClipInstance[]) {
  const deduplicated = sortBy(deduplicateInstances(instances), [(instance) => instance.startSeconds, (instance) => instance.endSeconds]);
  return {
    instances: deduplicated,
    grouped: groupInstances(deduplicated),
  };
}
