// eslint-disable-next-line import/no-extraneous-dependencies
import { describe, expect, test } from 'vitest';

import { defaultConfig } from './config.js';
import { CyclicNestingError, SequenceNotFoundError } from './errors.js';
import { walkSequence } from './sequenceWalker.js';
import { handTickConfig, loadFixtureGraph } from './test/util.js';

describe('walkSequence', () => {
  test('flattens a nested sequence onto the parent timeline', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    const { sequence, placements, warnings } = walkSequence(graph, 'seq-main', { config: handTickConfig });

    expect(sequence.name).toBe('Main Edit');
    expect(sequence.frameRateTicks).toBe(1001);
    expect(warnings).toEqual([]);
    expect(placements).toEqual([
      { name: 'Intro Nest', startTicks: 24000, endTicks: 72000, trackIndex: 0, isAudio: false, sourceSequence: undefined, isNestedContainer: true },
      { name: 'IMG_12345.mp4', startTicks: 24000, endTicks: 72000, trackIndex: 0, isAudio: false, sourceSequence: 'Intro Nest', sourcePath: '/footage/stock/IMG_12345.mp4', mediaKind: 'Video', isNestedContainer: false },
      { name: 'myFootage.mov', startTicks: 96000, endTicks: 120000, trackIndex: 0, isAudio: false, sourceSequence: undefined, sourcePath: 'C:\\Projects\\Shoot Day 1\\myFootage.mov', mediaKind: 'Video', isNestedContainer: false },
      { name: 'stockclip_67890_SunsetOverCity', startTicks: 0, endTicks: 48000, trackIndex: 0, isAudio: true, sourceSequence: undefined, sourcePath: '/music/stockclip_67890_SunsetOverCity.wav', mediaKind: 'Audio', isNestedContainer: false },
    ]);
  });

  test('walking the nested sequence alone', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    const { placements } = walkSequence(graph, 'Intro Nest', { config: handTickConfig });
    expect(placements.map(({ name, startTicks, endTicks, sourceSequence }) => ({ name, startTicks, endTicks, sourceSequence }))).toEqual([
      { name: 'IMG_12345.mp4', startTicks: 0, endTicks: 48000, sourceSequence: undefined },
    ]);
  });

  test('a clip sharing its name with the sequence made from it is not a nest', async () => {
    const graph = await loadFixtureGraph('self-named.xml');
    const { placements, warnings } = walkSequence(graph, 'interview.mov', { config: handTickConfig });
    expect(warnings).toEqual([]);
    expect(placements).toEqual([
      { name: 'interview.mov', startTicks: 0, endTicks: 48000, trackIndex: 0, isAudio: false, sourceSequence: undefined, sourcePath: '/shoot/interview.mov', mediaKind: 'Video', isNestedContainer: false },
    ]);
  });

  test('reuses a sequence nested twice, clamps children and offsets tracks', async () => {
    const graph = await loadFixtureGraph('reuse.xml');
    const { placements } = walkSequence(graph, 'Parent', { config: handTickConfig });
    expect(placements.map(({ name, startTicks, endTicks, trackIndex, sourceSequence, isNestedContainer }) => ({ name, startTicks, endTicks, trackIndex, sourceSequence, isNestedContainer }))).toEqual([
      { name: 'Child', startTicks: 0, endTicks: 24000, trackIndex: 0, sourceSequence: undefined, isNestedContainer: true },
      { name: 'a.mp4', startTicks: 0, endTicks: 24000, trackIndex: 0, sourceSequence: 'Child', isNestedContainer: false },
      { name: 'Child', startTicks: 48000, endTicks: 60000, trackIndex: 1, sourceSequence: undefined, isNestedContainer: true },
      { name: 'a.mp4', startTicks: 48000, endTicks: 60000, trackIndex: 1, sourceSequence: 'Child', isNestedContainer: false },
    ]);
  });

  test('cyclic nesting throws', async () => {
    const graph = await loadFixtureGraph('cycle.xml');
    expect(() => walkSequence(graph, 'seq-a', { config: handTickConfig })).toThrow(CyclicNestingError);
    expect(() => walkSequence(graph, 'seq-a', { config: handTickConfig })).toThrow('Sequence nests itself: Seq A -> Seq B -> Seq A');
  });

  test('dangling references are skipped with warnings', async () => {
    const graph = await loadFixtureGraph('dangling.xml', defaultConfig);
    const { placements, warnings } = walkSequence(graph, 'Broken', { config: defaultConfig });

    expect(placements.map(({ name, startTicks, endTicks, mediaKind }) => ({ name, startTicks, endTicks, mediaKind }))).toEqual([
      { name: 'good', startTicks: 0, endTicks: 254016000000, mediaKind: 'Video' },
      { name: 'orphan.mov', startTicks: 508032000000, endTicks: 762048000000, mediaKind: 'Video' },
    ]);
    expect(warnings).toEqual([
      { code: 'dangling-reference', message: 'Unresolved ObjectRef "21" (track item in sequence \'Broken\')' },
      { code: 'dangling-reference', message: 'Unresolved ObjectRef "39" (SubClip of track item)' },
      { code: 'dangling-reference', message: 'Unresolved ObjectRef "49" (Clip of SubClip 33)' },
      { code: 'dangling-reference', message: 'Unresolved ObjectURef "vt-missing" (track of sequence \'Broken\')' },
    ]);
  });

  test('unknown sequence', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    expect(() => walkSequence(graph, 'Nope', { config: handTickConfig })).toThrow(SequenceNotFoundError);
  });
});
