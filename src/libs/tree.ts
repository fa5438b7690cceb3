import { EmptyInputError, IndexOutOfRangeError, InvalidDigestError } from './errors.js';
import { getDefaultHasher } from './hasher.js';
import { logger } from '../utils/logger.js';
import type { BlockInput, Digest, Hasher, Leaf } from '../types/index.js';

export function toBuffer(block: BlockInput): Buffer {
  // always a private copy; callers keep ownership of their input
  return typeof block === 'string' ? Buffer.from(block, 'utf8') : Buffer.from(block);
}

/**
 * Sizes of every level, bottom to top. An unpaired digest is carried
 * up unchanged, so each level holds ceil(previous / 2) digests.
 */
function levelSizes(leafCount: number): number[] {
  const sizes = [leafCount];
  let size = leafCount;
  while (size > 1) {
    size = Math.ceil(size / 2);
    sizes.push(size);
  }
  return sizes;
}

/**
 * Immutable Merkle tree over an ordered list of blocks.
 *
 * Every digest of every level lives in one buffer; `offsets[level]` is the
 * slot of the first digest of that level. Build with `buildTree`.
 */
export class MerkleTree {
  readonly algorithm: string;
  readonly digestLength: number;
  private readonly offsets: number[];

  private constructor(
    private readonly hasher: Hasher,
    private readonly blocks: readonly Buffer[],
    private readonly sizes: readonly number[],
    private readonly arena: Buffer
  ) {
    this.algorithm = hasher.algorithm;
    this.digestLength = hasher.digestLength;
    this.offsets = [];
    let slot = 0;
    for (const size of sizes) {
      this.offsets.push(slot);
      slot += size;
    }
  }

  /**
   * Level 0 holds hashLeaf(block) for each block. Each higher level pairs
   * neighbours left to right with hashNode; an odd digest out at the end of
   * a level is promoted unchanged, never hashed with a copy of itself.
   */
  static build(blocks: readonly BlockInput[], hasher: Hasher): MerkleTree {
    if (blocks.length === 0) {
      throw new EmptyInputError();
    }

    const data = blocks.map(toBuffer);
    const sizes = levelSizes(data.length);
    const width = hasher.digestLength;
    const arena = Buffer.alloc(sizes.reduce((sum, size) => sum + size, 0) * width);

    const write = (slot: number, digest: Buffer): void => {
      if (digest.length !== width) {
        throw new InvalidDigestError(width, digest.length);
      }
      digest.copy(arena, slot * width);
    };
    const read = (slot: number): Buffer => arena.subarray(slot * width, (slot + 1) * width);

    data.forEach((block, i) => write(i, hasher.hashLeaf(block)));

    let below = 0;
    for (let level = 1; level < sizes.length; level++) {
      const above = below + sizes[level - 1];
      const count = sizes[level - 1];
      for (let i = 0; i < count; i += 2) {
        const target = above + i / 2;
        if (i + 1 < count) {
          write(target, hasher.hashNode(read(below + i), read(below + i + 1)));
        } else {
          read(below + i).copy(arena, target * width);
        }
      }
      below = above;
    }

    return new MerkleTree(hasher, Object.freeze(data), Object.freeze(sizes), arena);
  }

  root(): Digest {
    return this.nodeAt(this.levelCount() - 1, 0);
  }

  rootHex(): string {
    return this.root().toString('hex');
  }

  leafCount(): number {
    return this.blocks.length;
  }

  /** Number of levels above the leaves. */
  height(): number {
    return this.sizes.length - 1;
  }

  leafDigest(index: number): Digest {
    this.checkLeafIndex(index);
    return this.nodeAt(0, index);
  }

  leafData(index: number): Buffer {
    this.checkLeafIndex(index);
    return Buffer.from(this.blocks[index]);
  }

  /**
   * Index of the first leaf whose digest equals `digest`, or -1.
   */
  indexOfDigest(digest: Uint8Array): number {
    const needle = Buffer.from(digest);
    for (let i = 0; i < this.blocks.length; i++) {
      if (this.slot(0, i).equals(needle)) return i;
    }
    return -1;
  }

  /**
   * Index of the first leaf holding `data`, hashed with the tree's own
   * hasher, or -1.
   */
  indexOf(data: BlockInput): number {
    return this.indexOfDigest(this.hasher.hashLeaf(toBuffer(data)));
  }

  *leaves(): IterableIterator<Leaf> {
    for (let index = 0; index < this.blocks.length; index++) {
      yield { index, data: this.leafData(index), digest: this.leafDigest(index) };
    }
  }

  /** @internal */
  levelCount(): number {
    return this.sizes.length;
  }

  /** @internal */
  levelSize(level: number): number {
    if (!Number.isInteger(level) || level < 0 || level >= this.sizes.length) {
      throw new IndexOutOfRangeError(level, this.sizes.length, 'level');
    }
    return this.sizes[level];
  }

  /** @internal */
  nodeAt(level: number, position: number): Digest {
    const size = this.levelSize(level);
    if (!Number.isInteger(position) || position < 0 || position >= size) {
      throw new IndexOutOfRangeError(position, size, `position on level ${level}`);
    }
    return Buffer.from(this.slot(level, position));
  }

  private slot(level: number, position: number): Buffer {
    const start = (this.offsets[level] + position) * this.digestLength;
    return this.arena.subarray(start, start + this.digestLength);
  }

  private checkLeafIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.blocks.length) {
      throw new IndexOutOfRangeError(index, this.blocks.length);
    }
  }
}

/**
 * Build a tree from an ordered, non-empty list of blocks.
 */
export function buildTree(blocks: readonly BlockInput[], hasher: Hasher = getDefaultHasher()): MerkleTree {
  const started = Date.now();
  const tree = MerkleTree.build(blocks, hasher);
  logger.debug('merkle', 'tree_built', {
    details: { leaf_count: tree.leafCount(), height: tree.height(), algorithm: tree.algorithm, root: tree.rootHex() },
    duration_ms: Date.now() - started
  });
  return tree;
}
