/**
 * Shared TypeScript type definitions
 */

/** Raw hash output. Compared byte for byte. */
export type Digest = Buffer;

/** Leaf input as accepted by the builder; strings are UTF-8 encoded. */
export type BlockInput = Uint8Array | string;

/**
 * Hash capability injected into the builder and the verifier.
 * Leaf and node hashing must use distinct domain prefixes.
 */
export interface Hasher {
  readonly algorithm: string;
  readonly digestLength: number;
  hashLeaf(data: Uint8Array): Digest;
  hashNode(left: Uint8Array, right: Uint8Array): Digest;
}

/** Raw digest primitive, H(bytes) -> bytes. */
export type DigestFunction = (data: Uint8Array) => Uint8Array;

export interface Leaf {
  index: number;
  data: Buffer;
  digest: Digest;
}

/** Side of the sibling relative to the running hash. */
export type Side = 'left' | 'right';

export interface ProofNode {
  readonly digest: Digest;
  readonly side: Side;
}

export interface Proof {
  readonly algorithm: string;
  readonly leafIndex: number;
  readonly leafData: Buffer;
  readonly leafDigest: Digest;
  /** Bottom to top, root excluded. */
  readonly nodes: readonly ProofNode[];
  /** Root of the tree the proof was generated from. */
  readonly root: Digest;
}

export type VerificationFailure =
  | 'leaf_digest_mismatch'
  | 'algorithm_mismatch'
  | 'root_mismatch'
  | 'recorded_root_mismatch';

export interface VerificationResult {
  valid: boolean;
  reason?: VerificationFailure;
  recomputedRoot?: Digest;
}
