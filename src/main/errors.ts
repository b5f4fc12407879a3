import type { ObjectRef } from '../common/types.js';

export class CorruptProjectError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorruptProjectError';
  }
}

export class UnsupportedFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFormatError';
  }
}

export class DanglingReferenceError extends Error {
  ref: ObjectRef;

  constructor(ref: ObjectRef, context?: string) {
    super(`Unresolved ${ref.space === 'uid' ? 'ObjectURef' : 'ObjectRef'} "${ref.value}"${context ? ` (${context})` : ''}`);
    this.name = 'DanglingReferenceError';
    this.ref = ref;
  }
}

export class CyclicNestingError extends Error {
  chain: string[];

  constructor(chain: string[]) {
    super(`Sequence nests itself: ${chain.join(' -> ')}`);
    this.name = 'CyclicNestingError';
    this.chain = chain;
  }
}

export class SequenceNotFoundError extends Error {
  constructor(idOrName: string) {
    super(`Sequence not found: ${idOrName}`);
    this.name = 'SequenceNotFoundError';
  }
}
