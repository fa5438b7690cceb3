export { buildTree, MerkleTree } from './libs/tree.js';
export { generateProof, findProof, ProofVerifier, verifyProof } from './libs/proof.js';
export { createHasher, createHasherFromDigest, getDefaultHasher } from './libs/hasher.js';
export { encodeProof, decodeProof, encodeTree, decodeTree } from './libs/serialization.js';
export { canonicalize } from './libs/canonical.js';
export {
  MerkleError,
  EmptyInputError,
  IndexOutOfRangeError,
  LeafDigestMismatchError,
  HashPrimitiveUnavailableError,
  InvalidDigestError,
  ProofDecodeError
} from './libs/errors.js';
export type { MerkleErrorCode } from './libs/errors.js';
export type {
  BlockInput,
  Digest,
  DigestFunction,
  Hasher,
  Leaf,
  Proof,
  ProofNode,
  Side,
  VerificationFailure,
  VerificationResult
} from './types/index.js';
