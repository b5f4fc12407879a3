import { readFile } from 'node:fs/promises';

import type { AggregatedClip, ClipType, ExtractionWarning, FrameRate, GroupedRow, PerInstanceRow, RawPlacement, ResolvedClipInstance, SequenceSummary, VisualizationPayload } from '../common/types.js';
import { unnamedClipPrefix } from '../common/constants.js';
import { aggregate } from './aggregate.js';
import { detectClipType, detectClipTypeFromProject } from './clipType.js';
import { defaultConfig, type ExtractorConfig } from './config.js';
import { SequenceNotFoundError } from './errors.js';
import { buildVisualizationPayload, toGroupedRows, toPerInstanceRows } from './exportFormats.js';
import logger from './logger.js';
import { loadProjectGraph } from './projectFile.js';
import { findSequence, listSequences, ProjectGraph, sequenceName } from './projectGraph.js';
import { walkSequence } from './sequenceWalker.js';
import { defaultProviderRegistry, recognizeSource, type ProviderPattern } from './sourceProviders.js';
import { resolveFrameRate, secondsToTimecode, ticksToSeconds } from './timecode.js';


export type ProjectInput = Uint8Array | ProjectGraph;

export interface ExtractOptions {
  /** id, uid or name of the sequence to extract. Defaults to the first sequence in the project */
  sequence?: string | undefined,
  config?: ExtractorConfig | undefined,
  /** use this rate instead of the sequence's own */
  fpsOverride?: number | undefined,
  /** ignore everything from this many seconds on */
  capSeconds?: number | undefined,
  providers?: readonly ProviderPattern[] | undefined,
}

export interface TimelineExtraction {
  sequence: SequenceSummary,
  frameRate: FrameRate,
  /** distinct instances, nested sequence containers included, ordered by start */
  instances: ResolvedClipInstance[],
  grouped: AggregatedClip[],
  perInstanceRows: PerInstanceRow[],
  groupedRows: GroupedRow[],
  visualization: VisualizationPayload,
  warnings: ExtractionWarning[],
}

const toGraph = (input: ProjectInput, config: ExtractorConfig) => (input instanceof ProjectGraph ? input : loadProjectGraph(input, config));

export const isNamedClip = (name: string | undefined): name is string => name != null && name.trim() !== '' && !name.startsWith(unnamedClipPrefix);

export function listProjectSequences(input: ProjectInput, config: ExtractorConfig = defaultConfig): SequenceSummary[] {
  return listSequences(toGraph(input, config));
}

export function extractTimeline(input: ProjectInput, { sequence: sequenceIdOrName, config = defaultConfig, fpsOverride, capSeconds, providers = defaultProviderRegistry }: ExtractOptions = {}): TimelineExtraction {
  const graph = toGraph(input, config);

  const sequenceNode = sequenceIdOrName != null ? findSequence(graph, sequenceIdOrName) : graph.sequences.find((node) => sequenceName(node) != null);
  if (sequenceNode == null) throw new SequenceNotFoundError('(project has no sequences)');
  const sequence = { id: sequenceNode.id, name: sequenceName(sequenceNode) ?? sequenceNode.id };
  logger.info(`Extracting sequence '${sequence.name}'`);

  const walk = walkSequence(graph, sequenceNode, { config });
  const warnings = [...walk.warnings];
  logger.info(`Collected ${walk.placements.length} raw instances from sequence '${sequence.name}' before filtering`);

  const { frameRate, warnings: frameRateWarnings } = resolveFrameRate({ rawTicksPerFrame: walk.sequence.frameRateTicks, config, fpsOverride, sequenceName: sequence.name });
  frameRateWarnings.forEach((warning) => logger.warn(warning.message));
  warnings.push(...frameRateWarnings);
  logger.info(`Using ${frameRate.fps} fps (ticks per frame: ${frameRate.ticksPerFrame})`);

  const typeOf = (placement: RawPlacement, name: string): ClipType => {
    if (placement.isNestedContainer) return 'Nested sequence';
    return detectClipType({ name, sourcePath: placement.sourcePath, mediaKind: placement.mediaKind }, config)
      ?? detectClipTypeFromProject(name, graph, config)
      ?? 'Unknown';
  };

  const resolved = walk.placements.flatMap((placement): ResolvedClipInstance[] => {
    const { name } = placement;
    if (!isNamedClip(name)) return [];

    const startSeconds = ticksToSeconds(placement.startTicks, frameRate);
    let endSeconds = ticksToSeconds(placement.endTicks, frameRate);
    if (capSeconds != null) {
      if (startSeconds >= capSeconds) return [];
      endSeconds = Math.min(endSeconds, capSeconds);
    }

    // containers are only a frame for their children, which get recognized one by one
    const provider = placement.isNestedContainer ? undefined : recognizeSource(name, providers);

    return [{
      name,
      type: typeOf(placement, name),
      startSeconds,
      endSeconds,
      startTc: secondsToTimecode(startSeconds),
      endTc: secondsToTimecode(endSeconds),
      trackIndex: placement.trackIndex,
      isAudio: placement.isAudio,
      sourceSequence: placement.sourceSequence,
      source: provider?.source,
      mediaId: provider?.mediaId,
      title: provider?.title,
      instanceCount: 1,
    }];
  });
  logger.info(`${resolved.length} instances remaining after time conversion and filtering unnamed clips`);

  const { instances, grouped } = aggregate(resolved);
  logger.info(`${instances.length} instances remaining after deduplication, ${grouped.length} distinct clips`);

  return {
    sequence,
    frameRate,
    instances,
    grouped,
    perInstanceRows: toPerInstanceRows(instances),
    groupedRows: toGroupedRows(grouped),
    visualization: buildVisualizationPayload(instances, frameRate),
    warnings,
  };
}

export async function extractTimelineFromFile(path: string, options: ExtractOptions = {}) {
  logger.info('Reading project', path);
  return extractTimeline(await readFile(path), options);
}
