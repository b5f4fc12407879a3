import type { ClipType, MediaKind } from '../common/types.js';
import type { ExtractorConfig } from './config.js';
import type { ProjectGraph } from './projectGraph.js';
import { descendants } from './xml.js';


const normalize = (str: string) => str.toLowerCase().replaceAll(/\s+/g, ' ');

/** Last `.ext` in the string, lowercased with the dot, e.g. `.mp4` */
export function findExtension(str: string | undefined) {
  if (!str) return undefined;
  const matches = [...normalize(str).matchAll(/\.([a-z0-9]{2,20})(?=$|[^a-z0-9])/g)];
  const last = matches.at(-1);
  return last != null ? `.${last[1]}` : undefined;
}

export function classifyExtension(extension: string | undefined, config: ExtractorConfig): MediaKind | undefined {
  if (extension == null) return undefined;
  if (config.videoExtensions.includes(extension)) return 'Video';
  if (config.audioExtensions.includes(extension)) return 'Audio';
  if (config.imageExtensions.includes(extension)) return 'Image';
  if (config.graphicExtensions.includes(extension)) return 'Graphic';
  return undefined;
}

export function detectClipType({ name, sourcePath, mediaKind }: {
  name: string,
  sourcePath?: string | undefined,
  mediaKind?: MediaKind | undefined,
}, config: ExtractorConfig): ClipType | undefined {
  if (mediaKind != null) return mediaKind;

  // eslint-disable-next-line no-restricted-syntax
  for (const candidate of [sourcePath, name]) {
    const kind = classifyExtension(findExtension(candidate), config);
    if (kind != null) return kind;
  }

  const lowerName = name.toLowerCase();
  if (config.graphicNameKeywords.some((keyword) => lowerName.includes(keyword))) return 'Graphic';

  const lowerPath = sourcePath?.toLowerCase();
  if (lowerPath != null && config.graphicPathKeywords.some((keyword) => lowerPath.includes(keyword))) return 'Graphic';

  return undefined;
}

const projectTextsCache = new WeakMap<ProjectGraph, string[]>();

// every text in the project that could hold a file name, normalized once per graph
function getProjectTexts(graph: ProjectGraph) {
  let texts = projectTextsCache.get(graph);
  if (texts == null) {
    texts = [];
    // eslint-disable-next-line no-restricted-syntax
    for (const element of descendants(graph.root)) {
      if (element.text.includes('.')) texts.push(normalize(element.text));
    }
    projectTextsCache.set(graph, texts);
  }
  return texts;
}

/** Looks anywhere in the project for a file name that mentions the clip */
export function detectClipTypeFromProject(name: string, graph: ProjectGraph, config: ExtractorConfig): MediaKind | undefined {
  const needle = normalize(name).trim();
  if (needle === '') return undefined;
  // eslint-disable-next-line no-restricted-syntax
  for (const text of getProjectTexts(graph)) {
    if (text.includes(needle)) {
      const kind = classifyExtension(findExtension(text), config);
      if (kind != null) return kind;
    }
  }
  return undefined;
}
