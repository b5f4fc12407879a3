// eslint-disable-next-line import/no-extraneous-dependencies
import { describe, expect, test } from 'vitest';
import { ZodError } from 'zod';

import { createConfig, defaultConfig, loadConfig } from './config.js';
import { fixturePath } from './test/util.js';

describe('config', () => {
  test('defaults', () => {
    expect(defaultConfig.defaultFps).toBe(23.976);
    expect(defaultConfig.ticksPerSecond).toBe(254016000000);
    expect(defaultConfig.commonFrameRates['10594584']).toBe(23.976);
    expect(defaultConfig.supportedProjectVersions).toEqual({ min: 1, max: 3 });
  });

  test('is frozen', () => {
    expect(Object.isFrozen(defaultConfig)).toBe(true);
    expect(Object.isFrozen(defaultConfig.videoExtensions)).toBe(true);
    expect(Object.isFrozen(defaultConfig.commonFrameRates)).toBe(true);
  });

  test('overrides replace whole fields', () => {
    const config = createConfig({ audioExtensions: ['.wav'] });
    expect(config.audioExtensions).toEqual(['.wav']);
    expect(config.videoExtensions).toEqual(defaultConfig.videoExtensions);
  });

  test('rejects invalid values', () => {
    expect(() => createConfig({ defaultFps: -1 })).toThrow(ZodError);
    expect(() => createConfig({ videoExtensions: ['mp4'] })).toThrow(ZodError);
  });

  test('loadConfig without a path gives the defaults', async () => {
    expect(await loadConfig()).toBe(defaultConfig);
  });

  test('loadConfig reads json5', async () => {
    const config = await loadConfig(fixturePath('config.json5'));
    expect(config.defaultFps).toBe(25);
    expect(config.maxXmlDepth).toBe(128);
    expect(config.graphicNameKeywords).toEqual(['graphic', 'title', 'bauchbinde']);
    expect(config.ticksPerSecond).toBe(254016000000);
  });
});
