import invariant from 'tiny-invariant';

import type { ExtractionWarning, ObjectRef, RawPlacement } from '../common/types.js';
import { mainSequenceLabel } from '../common/constants.js';
import type { ExtractorConfig } from './config.js';
import { CyclicNestingError, DanglingReferenceError } from './errors.js';
import logger from './logger.js';
import { findSequence, sequenceName, type ObjectNode, type ProjectGraph } from './projectGraph.js';
import { readClipReference, readSequence, readTrackItem, readTrackItemRefs, type ClipMediaReference, type DanglingHandler, type SequenceObject } from './projectObjects.js';


export interface SequenceWalk {
  sequence: SequenceObject,
  placements: RawPlacement[],
  warnings: ExtractionWarning[],
}

interface WalkFrame {
  /** ticks added to every item of the walked sequence */
  offset: number,
  /** end of the nesting track item on the parent timeline */
  bound: number | undefined,
  sourceSequence: string | undefined,
  trackBase: number,
  chain: string[],
}

// nested sequence refs come as either ObjectURef or ObjectRef depending on the project version
function resolveSequenceRef(graph: ProjectGraph, ref: ObjectRef) {
  const node = graph.resolve(ref) ?? graph.resolve({ space: ref.space === 'uid' ? 'id' : 'uid', value: ref.value });
  return node?.kind === 'sequence' ? node : undefined;
}

/**
 * Flattens a sequence into placements on its own timeline, descending into nested sequences.
 * Children of a nested sequence are shifted by the nesting item's start and clamped to its end.
 * Unresolvable references are skipped and reported as warnings, a sequence that nests itself throws.
 */
export function walkSequence(graph: ProjectGraph, sequenceOrId: ObjectNode | string, { config }: { config: ExtractorConfig }): SequenceWalk {
  const root = typeof sequenceOrId === 'string' ? findSequence(graph, sequenceOrId) : sequenceOrId;
  invariant(root.kind === 'sequence', `Not a sequence: ${root.tag}`);

  const placements: RawPlacement[] = [];
  const warnings: ExtractionWarning[] = [];
  const inProgress = new Set<ObjectNode>();

  const onDangling: DanglingHandler = (error) => {
    logger.warn(error.message);
    warnings.push({ code: 'dangling-reference', message: error.message });
  };

  function walk(node: ObjectNode, frame: WalkFrame): SequenceObject {
    const label = sequenceName(node) ?? node.id;
    if (inProgress.has(node)) throw new CyclicNestingError([...frame.chain, label]);
    inProgress.add(node);

    try {
      const sequence = readSequence(graph, node, onDangling);
      const chain = [...frame.chain, label];
      const countBefore = placements.length;

      const walkItem = (itemRef: ObjectRef, trackIndex: number, isAudio: boolean) => {
        const itemNode = graph.resolve(itemRef);
        if (itemNode == null) {
          onDangling(new DanglingReferenceError(itemRef, `track item in sequence '${label}'`));
          return;
        }

        const item = readTrackItem(itemNode);
        // structural entries without timing
        if (item.startTicks == null) return;
        const end = item.endTicks ?? (item.durationTicks != null ? item.startTicks + item.durationTicks : undefined);
        if (end == null) return;
        if (end < item.startTicks) {
          logger.debug('Skipping track item', itemNode.id, 'ending before it starts');
          return;
        }

        let clip: ClipMediaReference | undefined;
        if (item.subClip != null) {
          try {
            clip = readClipReference(graph, item.subClip, config, onDangling);
          } catch (err) {
            if (!(err instanceof DanglingReferenceError)) throw err;
            onDangling(err);
            return;
          }
        }

        const name = item.name ?? clip?.name;
        const startTicks = frame.offset + item.startTicks;
        let endTicks = frame.offset + end;

        if (frame.bound != null) {
          if (startTicks >= frame.bound) return;
          endTicks = Math.min(endTicks, frame.bound);
        }

        const nestedRef = item.sequence ?? clip?.nestedSequence;
        let nested: ObjectNode | undefined;
        if (nestedRef != null) {
          nested = resolveSequenceRef(graph, nestedRef);
          if (nested == null) {
            onDangling(new DanglingReferenceError(nestedRef, `nested sequence of track item ${itemNode.id}`));
            return;
          }
        } else if (name != null && clip?.sourcePath == null && clip?.mediaKind == null) {
          // a clip with media is never a nest, even when a sequence was made from it and shares its name
          nested = graph.sequenceByName(name);
        }

        if (nested != null) {
          const nestedName = sequenceName(nested) ?? name;
          placements.push({
            name: nestedName,
            startTicks,
            endTicks,
            trackIndex,
            isAudio,
            sourceSequence: frame.sourceSequence,
            isNestedContainer: true,
          });
          walk(nested, {
            offset: startTicks,
            bound: endTicks,
            sourceSequence: nestedName,
            trackBase: trackIndex,
            chain,
          });
          return;
        }

        placements.push({
          name,
          startTicks,
          endTicks,
          trackIndex,
          isAudio,
          sourceSequence: frame.sourceSequence,
          sourcePath: clip?.sourcePath,
          mediaKind: clip?.mediaKind,
          isNestedContainer: false,
        });
      };

      const walkTracks = (trackRefs: ObjectRef[], isAudio: boolean) => trackRefs.forEach((trackRef, index) => {
        const track = graph.resolve(trackRef);
        if (track == null) {
          onDangling(new DanglingReferenceError(trackRef, `track of sequence '${label}'`));
          return;
        }
        readTrackItemRefs(track).forEach((itemRef) => walkItem(itemRef, frame.trackBase + index, isAudio));
      });

      // video tracks count bottom-up from V1, audio tracks top-down from A1
      walkTracks(sequence.videoTracks, false);
      walkTracks(sequence.audioTracks, true);

      logger.debug(`Flattened ${placements.length - countBefore} placements from sequence '${frame.sourceSequence ?? mainSequenceLabel}'`);
      return sequence;
    } finally {
      inProgress.delete(node);
    }
  }

  const sequence = walk(root, { offset: 0, bound: undefined, sourceSequence: undefined, trackBase: 0, chain: [] });
  return { sequence, placements, warnings };
}
