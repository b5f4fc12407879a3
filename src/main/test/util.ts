import fs from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { gzipSync } from 'node:zlib';

import { createConfig } from '../config.js';
import { loadProjectGraph } from '../projectFile.js';

// eslint-disable-next-line no-underscore-dangle
const __dirname = dirname(fileURLToPath(import.meta.url));

export const fixturePath = (name: string) => join(__dirname, 'fixtures', name);

export const readFixture = async (name: string) => fs.readFile(fixturePath(name), 'utf8');
export const readFixtureBinary = async (name: string) => fs.readFile(fixturePath(name), null);

// a tick base small enough to write fixtures by hand: FrameRate 1001 is then 24000/1001 fps
export const handTickConfig = createConfig({ ticksPerSecond: 24000 });

export const toProjectBytes = (xml: string) => gzipSync(Buffer.from(xml, 'utf8'));

export const graphFromXml = (xml: string, config = handTickConfig) => loadProjectGraph(Buffer.from(xml, 'utf8'), config);

export async function loadFixtureGraph(name: string, config = handTickConfig) {
  return graphFromXml(await readFixture(name), config);
}
