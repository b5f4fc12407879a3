import type { ProviderMatch, StockProvider } from '../common/types.js';


export interface ProviderPattern {
  provider: StockProvider,
  pattern: RegExp,
  parse: (match: RegExpMatchArray) => ProviderMatch,
}

const formatTitle = (raw: string | undefined) => {
  const title = raw?.replaceAll('_', ' ').trim();
  return title || undefined;
};

const providerPatterns: ProviderPattern[] = [
  {
    provider: 'Imago',
    // imago123456_some_title, IMG_12345
    pattern: /(?:^|[^a-z])(?:imago_?|img_)(\d+)/i,
    parse: (match) => ({ source: 'Imago', mediaId: match[1]! }),
  },
  {
    provider: 'Colourbox',
    // COLOURBOX12345678
    pattern: /(?:^|[^a-z])colou?rbox_?(\d+)/i,
    parse: (match) => ({ source: 'Colourbox', mediaId: match[1]! }),
  },
  {
    provider: 'Artlist',
    // stockclip_67890_SunsetOverCity
    pattern: /^(?:artlist|stockclip)_(\d+)(?:_(.+))?$/i,
    parse: (match) => ({ source: 'Artlist', mediaId: match[1]!, title: formatTitle(match[2]) }),
  },
  {
    provider: 'Artlist',
    // 123456_Title_Words_By_Some_Artist_Artlist
    pattern: /(\d+)_(.*?)_(?:By|From)_.*_Artlist/i,
    parse: (match) => ({ source: 'Artlist', mediaId: match[1]!, title: formatTitle(match[2]) }),
  },
];

// Tried in order, first match wins
export const defaultProviderRegistry: readonly ProviderPattern[] = Object.freeze(providerPatterns);

const stripExtension = (name: string) => name.replace(/\.[a-z0-9]{2,5}$/i, '');

export function recognizeSource(clipName: string, registry: readonly ProviderPattern[] = defaultProviderRegistry): ProviderMatch | undefined {
  const baseName = stripExtension(clipName.trim());
  if (baseName === '') return undefined;

  // eslint-disable-next-line no-restricted-syntax
  for (const { pattern, parse } of registry) {
    const match = baseName.match(pattern);
    if (match) return parse(match);
  }
  return undefined;
}
