import { basename } from 'node:path';
import uniqBy from 'lodash/uniqBy.js';

import type { MediaKind, ObjectRef } from '../common/types.js';
import { classifyExtension, findExtension } from './clipType.js';
import type { ExtractorConfig } from './config.js';
import { DanglingReferenceError } from './errors.js';
import { formatRef, refOf, sequenceName, type ObjectNode, type ProjectGraph } from './projectGraph.js';
import { childElements, descendants, descendantText, findChild, findDescendant, findDescendantByTag, isTag, type XmlElement } from './xml.js';


export type DanglingHandler = (error: DanglingReferenceError) => void;

export interface SequenceObject {
  node: ObjectNode,
  name: string | undefined,
  videoTracks: ObjectRef[],
  audioTracks: ObjectRef[],
  /** raw FrameRate of the video track group, in ticks per frame */
  frameRateTicks: number | undefined,
}

export interface TrackItemObject {
  node: ObjectNode,
  name: string | undefined,
  startTicks: number | undefined,
  endTicks: number | undefined,
  durationTicks: number | undefined,
  subClip: ObjectRef | undefined,
  sequence: ObjectRef | undefined,
}

export interface ClipMediaReference {
  name: string | undefined,
  sourcePath: string | undefined,
  sourceFilename: string | undefined,
  extension: string | undefined,
  mediaKind: MediaKind | undefined,
  nestedSequence: ObjectRef | undefined,
}

// lenient like the editor: "48000", "48000.0"
export function parseTicks(str: string | undefined) {
  if (str == null || str === '') return undefined;
  const value = Number(str);
  if (Number.isFinite(value)) return Math.trunc(value);
  const float = parseFloat(str);
  return Number.isFinite(float) ? Math.trunc(float) : undefined;
}

const uniqRefs = (refs: ObjectRef[]) => uniqBy(refs, formatRef);

export function readSequence(graph: ProjectGraph, node: ObjectNode, onDangling: DanglingHandler): SequenceObject {
  const videoTracks: ObjectRef[] = [];
  const audioTracks: ObjectRef[] = [];
  let frameRateTicks: number | undefined;

  const trackGroupsEl = findChild(node.element, 'TrackGroups') ?? node.element;
  // eslint-disable-next-line no-restricted-syntax
  for (const trackGroup of descendants(trackGroupsEl)) {
    const second = isTag(trackGroup, 'TrackGroup') ? findChild(trackGroup, 'Second') : undefined;
    const groupRef = second != null ? refOf(second, 'id') : undefined;
    if (groupRef != null) {
      const group = graph.resolve(groupRef);
      if (group == null) {
        onDangling(new DanglingReferenceError(groupRef, `track group of sequence ${node.id}`));
      } else {
        const isAudio = group.tag.toLowerCase().includes('audio');
        const target = isAudio ? audioTracks : videoTracks;
        // eslint-disable-next-line no-restricted-syntax
        for (const tracks of descendants(group.element)) {
          if (isTag(tracks, 'Tracks')) {
            childElements(tracks, 'Track').forEach((track) => {
              const trackRef = refOf(track, 'uid');
              if (trackRef != null) target.push(trackRef);
            });
          }
        }
        if (!isAudio && frameRateTicks == null) {
          const frameRate = parseTicks(descendantText(group.element, 'FrameRate'));
          if (frameRate != null && frameRate > 0) frameRateTicks = frameRate;
        }
      }
    }
  }

  return {
    node,
    name: sequenceName(node),
    videoTracks: uniqRefs(videoTracks),
    audioTracks: uniqRefs(audioTracks),
    frameRateTicks,
  };
}

export function readTrackItemRefs(track: ObjectNode) {
  const refs: ObjectRef[] = [];
  // transitions live under TransitionItems and are not clips
  const clipItems = findDescendantByTag(track.element, 'ClipItems');
  if (clipItems == null) return refs;
  // eslint-disable-next-line no-restricted-syntax
  for (const list of descendants(clipItems)) {
    if (isTag(list, 'TrackItems')) {
      childElements(list, 'TrackItem').forEach((item) => {
        const ref = refOf(item, 'id');
        if (ref != null) refs.push(ref);
      });
    }
  }
  return uniqRefs(refs);
}

export function readTrackItem(node: ObjectNode): TrackItemObject {
  const timing = findDescendant(node.element, (el) => isTag(el, 'TrackItem') && findChild(el, 'Start') != null) ?? node.element;
  const subClipEl = findDescendantByTag(node.element, 'SubClip');
  const sequenceEl = findDescendant(node.element, (el) => isTag(el, 'Sequence') && el.attributes['ObjectURef'] != null);

  return {
    node,
    name: findChild(node.element, 'Name')?.text || undefined,
    startTicks: parseTicks(descendantText(timing, 'Start')),
    endTicks: parseTicks(descendantText(timing, 'End')),
    durationTicks: parseTicks(descendantText(timing, 'Duration')),
    subClip: subClipEl != null ? refOf(subClipEl, 'id') : undefined,
    sequence: sequenceEl != null ? refOf(sequenceEl) : undefined,
  };
}

const pathTags = new Set(['actualmediafilepath', 'filepath', 'relativepath', 'pathurl', 'path', 'mediaurl', 'mediafile', 'fullpath', 'filename', 'url', 'title', 'filekey']);

const looksLikePath = (text: string) => text.includes('/') || text.includes('\\') || text.includes('.');

function findMediaPath(element: XmlElement) {
  return findDescendant(element, (el) => pathTags.has(el.tag.toLowerCase()) && looksLikePath(el.text))?.text;
}

const fileNameOf = (path: string) => basename(path.replaceAll('\\', '/'));

/**
 * Follows SubClip -> Clip -> Source -> Media (or SequenceSource -> Sequence),
 * falling back to the MasterClip for name and path.
 * Only a missing SubClip is fatal for the item, links further down are reported and skipped.
 */
export function readClipReference(graph: ProjectGraph, subClipRef: ObjectRef, config: ExtractorConfig, onDangling: DanglingHandler): ClipMediaReference {
  const subClip = graph.require(subClipRef, 'SubClip of track item');

  const follow = (from: XmlElement | undefined, tag: string, context: string) => {
    const el = from != null ? findDescendantByTag(from, tag) : undefined;
    const ref = el != null ? refOf(el) : undefined;
    if (ref == null) return undefined;
    const target = graph.resolve(ref);
    if (target == null) onDangling(new DanglingReferenceError(ref, context));
    return target;
  };

  let name = findChild(subClip.element, 'Name')?.text || undefined;
  let sourcePath: string | undefined;
  let nestedSequence: ObjectRef | undefined;

  const clip = follow(subClip.element, 'Clip', `Clip of SubClip ${subClip.id}`);
  const source = follow(clip?.element, 'Source', `Source of Clip ${clip?.id ?? ''}`);
  if (source != null) {
    if (source.tag.toLowerCase().includes('sequencesource')) {
      const sequenceEl = findDescendantByTag(source.element, 'Sequence');
      nestedSequence = sequenceEl != null ? refOf(sequenceEl) : undefined;
    } else {
      const media = follow(source.element, 'Media', `Media of ${source.tag} ${source.id}`);
      if (media != null) sourcePath = findMediaPath(media.element);
    }
  }

  if (name == null || (sourcePath == null && nestedSequence == null)) {
    const masterClip = follow(subClip.element, 'MasterClip', `MasterClip of SubClip ${subClip.id}`);
    if (masterClip != null) {
      name ??= findChild(masterClip.element, 'Name')?.text || descendantText(masterClip.element, 'Name');
      if (nestedSequence == null) sourcePath ??= findMediaPath(masterClip.element);
    }
  }

  const sourceFilename = sourcePath != null ? fileNameOf(sourcePath) : undefined;
  const extension = findExtension(sourceFilename) ?? findExtension(name);

  return {
    name,
    sourcePath,
    sourceFilename,
    extension,
    mediaKind: classifyExtension(extension, config),
    nestedSequence,
  };
}
