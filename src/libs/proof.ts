import { IndexOutOfRangeError, LeafDigestMismatchError } from './errors.js';
import { getDefaultHasher } from './hasher.js';
import { logger } from '../utils/logger.js';
import type { MerkleTree } from './tree.js';
import type { BlockInput, Digest, Hasher, Proof, ProofNode, VerificationResult } from '../types/index.js';

export function freezeProof(proof: Proof): Proof {
  return Object.freeze({
    ...proof,
    nodes: Object.freeze(proof.nodes.map(node => Object.freeze({ ...node })))
  });
}

/**
 * Inclusion proof for the leaf at `leafIndex`.
 *
 * Walks up from level 0. An even position pairs with the digest to its
 * right, an odd one with the digest to its left. A digest promoted
 * without a partner contributes no node for that level.
 */
export function generateProof(tree: MerkleTree, leafIndex: number): Proof {
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= tree.leafCount()) {
    throw new IndexOutOfRangeError(leafIndex, tree.leafCount());
  }

  const nodes: ProofNode[] = [];
  let position = leafIndex;
  for (let level = 0; level < tree.levelCount() - 1; level++) {
    if (position % 2 === 1) {
      nodes.push({ digest: tree.nodeAt(level, position - 1), side: 'left' });
    } else if (position + 1 < tree.levelSize(level)) {
      nodes.push({ digest: tree.nodeAt(level, position + 1), side: 'right' });
    }
    position = Math.floor(position / 2);
  }

  return freezeProof({
    algorithm: tree.algorithm,
    leafIndex,
    leafData: tree.leafData(leafIndex),
    leafDigest: tree.leafDigest(leafIndex),
    nodes,
    root: tree.root()
  });
}

/**
 * Proof for the first leaf holding `data`, or null when no leaf does.
 */
export function findProof(tree: MerkleTree, data: BlockInput): Proof | null {
  const index = tree.indexOf(data);
  return index === -1 ? null : generateProof(tree, index);
}

/**
 * Recomputes roots from proofs. Holds no state besides its hasher, so one
 * instance can check any number of proofs.
 */
export class ProofVerifier {
  constructor(private readonly hasher: Hasher = getDefaultHasher()) {}

  /**
   * True iff the proof folds up to `trustedRoot` and records it as its root.
   * Throws LeafDigestMismatchError when the proof's leaf digest does not
   * match its own leaf data.
   */
  verify(proof: Proof, trustedRoot: Uint8Array): boolean {
    const result = this.inspect(proof, trustedRoot);
    if (result.reason === 'leaf_digest_mismatch') {
      throw new LeafDigestMismatchError(proof.leafIndex);
    }
    return result.valid;
  }

  inspect(proof: Proof, trustedRoot: Uint8Array): VerificationResult {
    if (proof.algorithm !== this.hasher.algorithm) {
      return { valid: false, reason: 'algorithm_mismatch' };
    }

    let current: Digest = this.hasher.hashLeaf(proof.leafData);
    if (!current.equals(proof.leafDigest)) {
      logger.logSecurityEvent('leaf_digest_mismatch', {
        leaf_index: proof.leafIndex,
        claimed_digest: proof.leafDigest
      }, 'LEAF_DIGEST_MISMATCH');
      return { valid: false, reason: 'leaf_digest_mismatch' };
    }

    for (const node of proof.nodes) {
      current = node.side === 'right'
        ? this.hasher.hashNode(current, node.digest)
        : this.hasher.hashNode(node.digest, current);
    }

    if (!current.equals(trustedRoot)) {
      return { valid: false, reason: 'root_mismatch', recomputedRoot: current };
    }
    // the path checks out, but the proof claims to come from another tree
    if (!proof.root.equals(trustedRoot)) {
      return { valid: false, reason: 'recorded_root_mismatch', recomputedRoot: current };
    }
    return { valid: true, recomputedRoot: current };
  }
}

export function verifyProof(proof: Proof, trustedRoot: Uint8Array, hasher?: Hasher): boolean {
  return new ProofVerifier(hasher).verify(proof, trustedRoot);
}
