import type { ObjectRef, RefSpace, SequenceSummary } from '../common/types.js';
import { DanglingReferenceError, SequenceNotFoundError } from './errors.js';
import { descendants, descendantText, findChild, type XmlElement } from './xml.js';


export type ObjectKind = 'sequence' | 'track' | 'trackItem' | 'clipReference' | 'other';

export interface ObjectNode {
  kind: ObjectKind,
  space: RefSpace,
  id: string,
  tag: string,
  element: XmlElement,
  /** outgoing references, in document order. Resolved lazily through the graph */
  refs: ObjectRef[],
}

const clipReferenceTags = new Set(['subclip', 'masterclip', 'videoclip', 'audioclip', 'media', 'videomediasource', 'audiomediasource', 'videosequencesource', 'audiosequencesource', 'clipprojectitem']);

export function classifyObject(tag: string): ObjectKind {
  const lower = tag.toLowerCase();
  if (lower === 'sequence') return 'sequence';
  if (lower.endsWith('cliptrackitem')) return 'trackItem';
  if (lower.endsWith('cliptrack')) return 'track';
  if (clipReferenceTags.has(lower)) return 'clipReference';
  return 'other';
}

/**
 * Reads the reference an element points to. Premiere mostly uses attributes,
 * but some older elements carry the id as text content.
 */
export function refOf(element: XmlElement, textSpace?: RefSpace): ObjectRef | undefined {
  const { ObjectRef: objectRef, ObjectURef: objectURef } = element.attributes;
  if (objectRef) return { space: 'id', value: objectRef };
  if (objectURef) return { space: 'uid', value: objectURef };
  if (textSpace != null && element.text !== '') return { space: textSpace, value: element.text };
  return undefined;
}

export const formatRef = (ref: ObjectRef) => `${ref.space}:${ref.value}`;

function collectRefs(element: XmlElement) {
  const refs: ObjectRef[] = [];
  // eslint-disable-next-line no-restricted-syntax
  for (const el of descendants(element)) {
    const ref = refOf(el);
    if (ref) refs.push(ref);
  }
  return refs;
}

export function sequenceName(node: ObjectNode) {
  const own = findChild(node.element, 'Name')?.text;
  return own || descendantText(node.element, 'Name');
}

export class ProjectGraph {
  readonly root: XmlElement;

  private readonly byId = new Map<string, ObjectNode>();

  private readonly byUid = new Map<string, ObjectNode>();

  private readonly sequenceList: ObjectNode[] = [];

  private readonly sequencesByName = new Map<string, ObjectNode>();

  private objectCount = 0;

  private constructor(root: XmlElement) {
    this.root = root;
  }

  static build(root: XmlElement) {
    const graph = new ProjectGraph(root);
    // eslint-disable-next-line no-restricted-syntax
    for (const element of descendants(root)) {
      const { ObjectID: objectId, ObjectUID: objectUid } = element.attributes;
      // an element carrying both ids is reachable from both spaces
      const ids: [RefSpace, string][] = [];
      if (objectId) ids.push(['id', objectId]);
      if (objectUid) ids.push(['uid', objectUid]);
      const [first] = ids;
      if (first != null) {
        const node: ObjectNode = {
          kind: classifyObject(element.tag),
          space: first[0],
          id: first[1],
          tag: element.tag,
          element,
          refs: collectRefs(element),
        };
        ids.forEach(([space, id]) => (space === 'id' ? graph.byId : graph.byUid).set(id, node));
        graph.objectCount += 1;
        if (node.kind === 'sequence') graph.addSequence(node);
      }
    }
    return graph;
  }

  private addSequence(node: ObjectNode) {
    this.sequenceList.push(node);
    const name = sequenceName(node);
    if (name != null && !this.sequencesByName.has(name)) this.sequencesByName.set(name, node);
  }

  get size() {
    return this.objectCount;
  }

  get sequences(): readonly ObjectNode[] {
    return this.sequenceList;
  }

  resolve(ref: ObjectRef) {
    return (ref.space === 'id' ? this.byId : this.byUid).get(ref.value);
  }

  require(ref: ObjectRef, context?: string) {
    const node = this.resolve(ref);
    if (node == null) throw new DanglingReferenceError(ref, context);
    return node;
  }

  sequenceByName(name: string) {
    return this.sequencesByName.get(name);
  }
}

export function listSequences(graph: ProjectGraph): SequenceSummary[] {
  return graph.sequences.flatMap((node) => {
    const name = sequenceName(node);
    return name != null ? [{ id: node.id, name }] : [];
  });
}

export function findSequence(graph: ProjectGraph, idOrName: string) {
  const byRef = graph.resolve({ space: 'uid', value: idOrName }) ?? graph.resolve({ space: 'id', value: idOrName });
  if (byRef != null && byRef.kind === 'sequence') return byRef;
  const byName = graph.sequenceByName(idOrName);
  if (byName != null) return byName;
  throw new SequenceNotFoundError(idOrName);
}
