import { readFile } from 'node:fs/promises';
import { gunzipSync } from 'node:zlib';

import { projectRootTag } from '../common/constants.js';
import type { ExtractorConfig } from './config.js';
import { CorruptProjectError, UnsupportedFormatError } from './errors.js';
import logger from './logger.js';
import { ProjectGraph } from './projectGraph.js';
import { isTag, parseXmlDocument } from './xml.js';


const isGzip = (bytes: Uint8Array) => bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;

/** .prproj files are gzipped XML, but already unpacked XML is accepted too */
export function decodeProjectBytes(bytes: Uint8Array, config: ExtractorConfig) {
  if (bytes.length === 0) throw new CorruptProjectError('Project file is empty');
  if (bytes.length > config.maxProjectBytes) throw new CorruptProjectError(`Project file is larger than ${config.maxProjectBytes} bytes`);

  let xmlBytes: Uint8Array = bytes;
  if (isGzip(bytes)) {
    try {
      xmlBytes = gunzipSync(bytes, { maxOutputLength: config.maxProjectBytes });
    } catch (err) {
      throw new CorruptProjectError('Project file could not be decompressed', { cause: err });
    }
  }

  const xml = Buffer.from(xmlBytes.buffer, xmlBytes.byteOffset, xmlBytes.byteLength).toString('utf8');
  return xml.startsWith('\uFEFF') ? xml.slice(1) : xml;
}

export function parseProjectXml(xml: string, config: ExtractorConfig) {
  const root = parseXmlDocument(xml, { maxDepth: config.maxXmlDepth });

  if (!isTag(root, projectRootTag)) throw new UnsupportedFormatError(`Expected <${projectRootTag}> root element, got <${root.tag}>`);

  const { min, max } = config.supportedProjectVersions;
  const versionStr = root.attributes['Version'];
  const version = versionStr != null ? parseInt(versionStr, 10) : undefined;
  if (version == null || Number.isNaN(version) || version < min || version > max) {
    throw new UnsupportedFormatError(`Unsupported project version ${versionStr ?? '(none)'}, expected ${min}-${max}`);
  }
  return root;
}

export function loadProjectGraph(bytes: Uint8Array, config: ExtractorConfig) {
  const root = parseProjectXml(decodeProjectBytes(bytes, config), config);
  const graph = ProjectGraph.build(root);
  logger.info(`Indexed ${graph.size} objects, ${graph.sequences.length} sequences`);
  return graph;
}

export async function loadProjectFile(path: string, config: ExtractorConfig) {
  logger.info('Reading project', path);
  return loadProjectGraph(await readFile(path), config);
}
