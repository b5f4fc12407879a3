import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { CorruptProjectError } from './errors.js';


export interface XmlElement {
  tag: string,
  attributes: Record<string, string>,
  children: XmlElement[],
  /** direct text content, trimmed */
  text: string,
}

const isRecord = (value: unknown): value is Record<string, unknown> => value != null && typeof value === 'object' && !Array.isArray(value);

export const localName = (tag: string) => tag.slice(tag.lastIndexOf(':') + 1);

export const isTag = (element: XmlElement, name: string) => localName(element.tag).toLowerCase() === name.toLowerCase();

export const childElements = (element: XmlElement, name?: string) => (
  name == null ? element.children : element.children.filter((child) => isTag(child, name))
);

export const findChild = (element: XmlElement, name: string) => element.children.find((child) => isTag(child, name));

// depth first, document order, without recursion (projects nest deeply)
export function* descendants(element: XmlElement): Generator<XmlElement> {
  const stack = [...element.children].reverse();
  for (let next = stack.pop(); next != null; next = stack.pop()) {
    yield next;
    stack.push(...[...next.children].reverse());
  }
}

export function findDescendant(element: XmlElement, predicate: (el: XmlElement) => boolean) {
  // eslint-disable-next-line no-restricted-syntax
  for (const el of descendants(element)) {
    if (predicate(el)) return el;
  }
  return undefined;
}

export const findDescendantByTag = (element: XmlElement, name: string) => findDescendant(element, (el) => isTag(el, name));

/** text of the first descendant with this tag that has any text */
export function descendantText(element: XmlElement, name: string) {
  return findDescendant(element, (el) => isTag(el, name) && el.text !== '')?.text;
}

const hostileMarkup = /<!(?:DOCTYPE|ENTITY)/i;

function readAttributes(node: Record<string, unknown>) {
  const attrs = node[':@'];
  if (!isRecord(attrs)) return {};
  return Object.fromEntries(Object.entries(attrs).flatMap(([key, value]) => (typeof value === 'string' ? [[key, value]] : [])));
}

function elementKey(node: Record<string, unknown>) {
  return Object.keys(node).find((key) => key !== ':@');
}

export function parseXmlDocument(xml: string, { maxDepth }: { maxDepth: number }): XmlElement {
  // entity declarations are the vector for expansion bombs and external entities
  if (hostileMarkup.test(xml)) throw new CorruptProjectError('Project XML must not contain DOCTYPE or ENTITY declarations');

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new CorruptProjectError(`Project XML is not well-formed: ${msg} (line ${line}, column ${col})`);
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    trimValues: true,
  });
  const parsed: unknown = parser.parse(xml);
  if (!Array.isArray(parsed)) throw new CorruptProjectError('Project XML has no content');

  const document: XmlElement = { tag: '#document', attributes: {}, children: [], text: '' };

  const stack: { nodes: unknown[], target: XmlElement, depth: number }[] = [{ nodes: parsed, target: document, depth: 0 }];
  for (let entry = stack.pop(); entry != null; entry = stack.pop()) {
    const { nodes, target, depth } = entry;
    if (depth > maxDepth) throw new CorruptProjectError(`Project XML nests deeper than ${maxDepth} levels`);

    const texts: string[] = [];
    nodes.forEach((node) => {
      if (!isRecord(node)) return;
      const key = elementKey(node);
      if (key == null) return;
      const value = node[key];
      if (key === '#text') {
        if (typeof value === 'string' || typeof value === 'number') texts.push(String(value));
        return;
      }
      const element: XmlElement = { tag: key, attributes: readAttributes(node), children: [], text: '' };
      target.children.push(element);
      if (Array.isArray(value)) stack.push({ nodes: value, target: element, depth: depth + 1 });
    });
    target.text = texts.join('').trim();
  }

  const [root] = document.children;
  if (root == null) throw new CorruptProjectError('Project XML has no root element');
  return root;
}
