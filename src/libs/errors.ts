import { ERROR_MESSAGES } from '../constants.js';

export type MerkleErrorCode = keyof typeof ERROR_MESSAGES;

/**
 * Base class for every failure raised by tree construction, proof
 * generation, verification and decoding.
 */
export class MerkleError extends Error {
  readonly code: MerkleErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: MerkleErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'MerkleError';
    this.code = code;
    this.details = details;
  }
}

export class EmptyInputError extends MerkleError {
  constructor() {
    super('EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class IndexOutOfRangeError extends MerkleError {
  constructor(index: number, length: number, what: string = 'leaf') {
    super('INDEX_OUT_OF_RANGE', `${ERROR_MESSAGES.INDEX_OUT_OF_RANGE}: ${what} ${index} (size ${length})`, {
      index,
      length
    });
    this.name = 'IndexOutOfRangeError';
  }
}

export class LeafDigestMismatchError extends MerkleError {
  constructor(leafIndex: number) {
    super('LEAF_DIGEST_MISMATCH', undefined, { leafIndex });
    this.name = 'LeafDigestMismatchError';
  }
}

/** Fatal: nothing works without a hash function. */
export class HashPrimitiveUnavailableError extends MerkleError {
  constructor(algorithm: string, cause?: unknown) {
    super('HASH_PRIMITIVE_UNAVAILABLE', `${ERROR_MESSAGES.HASH_PRIMITIVE_UNAVAILABLE}: ${algorithm}`, { algorithm });
    this.name = 'HashPrimitiveUnavailableError';
    if (cause !== undefined) this.cause = cause;
  }
}

export class InvalidDigestError extends MerkleError {
  constructor(expected: number, actual: number) {
    super('INVALID_DIGEST', `${ERROR_MESSAGES.INVALID_DIGEST}: expected ${expected} bytes, got ${actual}`, {
      expected,
      actual
    });
    this.name = 'InvalidDigestError';
  }
}

export class ProofDecodeError extends MerkleError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('PROOF_DECODE', `${ERROR_MESSAGES.PROOF_DECODE}:\n${issues.join('\n')}`, { issues });
    this.name = 'ProofDecodeError';
    this.issues = issues;
  }
}
