import JSON5 from 'json5';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { defaultFps, premiereTicksPerSecond } from '../common/constants.js';
import logger from './logger.js';


const extensionListSchema = z.string().regex(/^\.[a-z0-9]+$/).array();

export const extractorConfigSchema = z.object({
  defaultFps: z.number().positive(),
  ticksPerSecond: z.number().positive(),
  /** raw FrameRate value (ticks per frame, scaled down) -> nominal fps */
  commonFrameRates: z.record(z.string().regex(/^\d+$/), z.number().positive()),
  videoExtensions: extensionListSchema,
  audioExtensions: extensionListSchema,
  imageExtensions: extensionListSchema,
  graphicExtensions: extensionListSchema,
  graphicNameKeywords: z.string().array(),
  graphicPathKeywords: z.string().array(),
  maxXmlDepth: z.number().int().positive(),
  maxProjectBytes: z.number().int().positive(),
  supportedProjectVersions: z.object({ min: z.number().int(), max: z.number().int() }),
});

type ExtractorConfigShape = z.infer<typeof extractorConfigSchema>;

export type ExtractorConfig = Readonly<{
  [K in keyof ExtractorConfigShape]: ExtractorConfigShape[K] extends (infer U)[] ? readonly U[] : Readonly<ExtractorConfigShape[K]>
}>;

const defaults: ExtractorConfigShape = {
  defaultFps,
  ticksPerSecond: premiereTicksPerSecond,
  commonFrameRates: {
    10594584: 23.976,
    10160640: 25,
    8475667: 29.97,
    8408400: 30,
    5080320: 50,
    4237833: 59.94,
    4204200: 60,
  },
  videoExtensions: ['.mp4', '.mov', '.mkv', '.avi', '.wmv', '.mxf', '.m2ts', '.m2t', '.mts', '.mpeg', '.mpg', '.flv', '.webm', '.3gp', '.ogv'],
  audioExtensions: ['.wav', '.mp3', '.aac', '.flac', '.aiff', '.m4a', '.ogg', '.wma', '.alac'],
  imageExtensions: ['.jpg', '.jpeg', '.png', '.tif', '.tiff', '.bmp', '.gif', '.svg', '.heic', '.webp', '.psd', '.raw', '.exr'],
  graphicExtensions: ['.aegraphic', '.mogrt', '.aep', '.aepx'],
  graphicNameKeywords: ['graphic', 'title', 'caption', 'overlay', 'lowerthird'],
  graphicPathKeywords: ['graphics', 'templates', 'motion graphics', 'mogrt'],
  maxXmlDepth: 256,
  maxProjectBytes: 500 * 1024 * 1024,
  supportedProjectVersions: { min: 1, max: 3 },
};

const freeze = (config: ExtractorConfigShape): ExtractorConfig => Object.freeze({
  ...config,
  commonFrameRates: Object.freeze({ ...config.commonFrameRates }),
  videoExtensions: Object.freeze([...config.videoExtensions]),
  audioExtensions: Object.freeze([...config.audioExtensions]),
  imageExtensions: Object.freeze([...config.imageExtensions]),
  graphicExtensions: Object.freeze([...config.graphicExtensions]),
  graphicNameKeywords: Object.freeze([...config.graphicNameKeywords]),
  graphicPathKeywords: Object.freeze([...config.graphicPathKeywords]),
  supportedProjectVersions: Object.freeze({ ...config.supportedProjectVersions }),
});

export const defaultConfig = freeze(defaults);

export function createConfig(overrides: unknown = {}): ExtractorConfig {
  const partial = extractorConfigSchema.partial().parse(overrides);
  return freeze(extractorConfigSchema.parse({ ...defaults, ...partial }));
}

export async function loadConfig(path?: string | undefined) {
  if (path == null) return defaultConfig;
  logger.info('Loading config from', path);
  const json: unknown = JSON5.parse(await readFile(path, 'utf8'));
  return createConfig(json);
}
