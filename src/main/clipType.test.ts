// eslint-disable-next-line import/no-extraneous-dependencies
import { describe, expect, test } from 'vitest';

import { classifyExtension, detectClipType, detectClipTypeFromProject, findExtension } from './clipType.js';
import { createConfig, defaultConfig } from './config.js';
import { loadFixtureGraph } from './test/util.js';

describe('findExtension', () => {
  test('last extension, lowercased', () => {
    expect(findExtension('C:\\Projects\\Shoot Day 1\\myFootage.mov')).toBe('.mov');
    expect(findExtension('clip.v2.final.MP4')).toBe('.mp4');
    expect(findExtension('interview.mxf (copy)')).toBe('.mxf');
  });

  test('no extension', () => {
    expect(findExtension('no extension')).toBeUndefined();
    expect(findExtension('file.x')).toBeUndefined();
    expect(findExtension(undefined)).toBeUndefined();
  });
});

describe('classifyExtension', () => {
  test('tables', () => {
    expect(classifyExtension('.mov', defaultConfig)).toBe('Video');
    expect(classifyExtension('.wav', defaultConfig)).toBe('Audio');
    expect(classifyExtension('.psd', defaultConfig)).toBe('Image');
    expect(classifyExtension('.mogrt', defaultConfig)).toBe('Graphic');
    expect(classifyExtension('.txt', defaultConfig)).toBeUndefined();
  });

  test('configured tables', () => {
    const config = createConfig({ videoExtensions: ['.r3d'] });
    expect(classifyExtension('.r3d', config)).toBe('Video');
    expect(classifyExtension('.mov', config)).toBeUndefined();
  });
});

describe('detectClipType', () => {
  test('explicit media kind wins', () => {
    expect(detectClipType({ name: 'thing.png', mediaKind: 'Audio' }, defaultConfig)).toBe('Audio');
  });

  test('source path before name', () => {
    expect(detectClipType({ name: 'thing.mp4', sourcePath: '/stills/thing.png' }, defaultConfig)).toBe('Image');
    expect(detectClipType({ name: 'song.mp3' }, defaultConfig)).toBe('Audio');
  });

  test('graphic heuristics', () => {
    expect(detectClipType({ name: 'Lower Third Title' }, defaultConfig)).toBe('Graphic');
    expect(detectClipType({ name: 'logo', sourcePath: '/Project/Graphics/logo' }, defaultConfig)).toBe('Graphic');
  });

  test('unknown', () => {
    expect(detectClipType({ name: 'interview' }, defaultConfig)).toBeUndefined();
  });
});

describe('detectClipTypeFromProject', () => {
  test('finds a file name mentioning the clip', async () => {
    const graph = await loadFixtureGraph('nested.xml');
    expect(detectClipTypeFromProject('IMG_12345', graph, defaultConfig)).toBe('Video');
    expect(detectClipTypeFromProject('stockclip_67890_SunsetOverCity', graph, defaultConfig)).toBe('Audio');
    expect(detectClipTypeFromProject('Intro Nest', graph, defaultConfig)).toBeUndefined();
    expect(detectClipTypeFromProject('  ', graph, defaultConfig)).toBeUndefined();
  });
});
