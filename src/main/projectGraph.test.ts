// eslint-disable-next-line import/no-extraneous-dependencies
import { describe, expect, test } from 'vitest';

import { DanglingReferenceError, SequenceNotFoundError } from './errors.js';
import { classifyObject, findSequence, formatRef, listSequences, ProjectGraph, refOf } from './projectGraph.js';
import { loadFixtureGraph } from './test/util.js';
import { parseXmlDocument } from './xml.js';

describe('classifyObject', () => {
  test('known tags', () => {
    expect(classifyObject('Sequence')).toBe('sequence');
    expect(classifyObject('VideoClipTrack')).toBe('track');
    expect(classifyObject('AudioClipTrackItem')).toBe('trackItem');
    expect(classifyObject('SubClip')).toBe('clipReference');
    expect(classifyObject('VideoSequenceSource')).toBe('clipReference');
    expect(classifyObject('VideoTrackGroup')).toBe('other');
  });
});

describe('refOf', () => {
  test('attribute and text references', () => {
    const root = parseXmlDocument('<R><A ObjectRef="12"/><B ObjectURef="u-1"/><C>34</C><D/></R>', { maxDepth: 8 });
    const [a, b, c, d] = root.children;
    expect(a && refOf(a)).toEqual({ space: 'id', value: '12' });
    expect(b && refOf(b)).toEqual({ space: 'uid', value: 'u-1' });
    expect(c && refOf(c)).toBeUndefined();
    expect(c && refOf(c, 'id')).toEqual({ space: 'id', value: '34' });
    expect(d && refOf(d, 'id')).toBeUndefined();
  });

  test('formatRef', () => {
    expect(formatRef({ space: 'uid', value: 'abc' })).toBe('uid:abc');
  });
});

describe('ProjectGraph', () => {
  test('indexes both id spaces', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    expect(graph.size).toBe(27);
    expect(graph.resolve({ space: 'id', value: '20' })?.tag).toBe('VideoClipTrackItem');
    expect(graph.resolve({ space: 'uid', value: 'media-img' })?.kind).toBe('clipReference');
    // same value, other space
    expect(graph.resolve({ space: 'uid', value: '20' })).toBeUndefined();
  });

  test('require throws on dangling references', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    expect(() => graph.require({ space: 'id', value: '999' }, 'test')).toThrow(DanglingReferenceError);
    expect(() => graph.require({ space: 'id', value: '999' }, 'test')).toThrow('Unresolved ObjectRef "999" (test)');
  });

  test('lists sequences in document order', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    expect(listSequences(graph)).toEqual([
      { id: 'seq-main', name: 'Main Edit' },
      { id: 'seq-nest', name: 'Intro Nest' },
    ]);
  });

  test('findSequence by id or name', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    expect(findSequence(graph, 'seq-nest').id).toBe('seq-nest');
    expect(findSequence(graph, 'Main Edit').id).toBe('seq-main');
    // an object that is not a sequence
    expect(() => findSequence(graph, '20')).toThrow(SequenceNotFoundError);
    expect(() => findSequence(graph, 'Nope')).toThrow('Sequence not found: Nope');
  });

  test('first sequence wins for a duplicate name', () => {
    const root = parseXmlDocument('<PremiereData Version="3"><Sequence ObjectUID="a"><Name>Dup</Name></Sequence><Sequence ObjectUID="b"><Name>Dup</Name></Sequence></PremiereData>', { maxDepth: 8 });
    const graph = ProjectGraph.build(root);
    expect(graph.sequences).toHaveLength(2);
    expect(graph.sequenceByName('Dup')?.id).toBe('a');
  });
});
