import { describe, expect, it } from 'vitest';
import { buildTree, MerkleTree } from './tree.js';
import { createHasher, createHasherFromDigest } from './hasher.js';
import { EmptyInputError, IndexOutOfRangeError, InvalidDigestError } from './errors.js';

const hasher = createHasher('sha256');
const H = (s: string): Buffer => hasher.hashLeaf(Buffer.from(s));
const N = (l: Buffer, r: Buffer): Buffer => hasher.hashNode(l, r);

describe('buildTree', () => {
  it('rejects an empty block list', () => {
    expect(() => buildTree([], hasher)).toThrow(EmptyInputError);
    expect(() => buildTree([], hasher)).toThrow('Cannot build a Merkle tree from zero blocks');
  });

  it('uses the leaf digest as root for a single block', () => {
    const tree = buildTree(['only'], hasher);
    expect(tree.root()).toEqual(H('only'));
    expect(tree.leafCount()).toBe(1);
    expect(tree.height()).toBe(0);
    expect(tree.levelCount()).toBe(1);
  });

  it('promotes the unpaired digest of an odd level unchanged', () => {
    const tree = buildTree(['a', 'b', 'c'], hasher);

    expect([tree.levelSize(0), tree.levelSize(1), tree.levelSize(2)]).toEqual([3, 2, 1]);
    expect(tree.nodeAt(0, 2)).toEqual(H('c'));
    expect(tree.nodeAt(1, 0)).toEqual(N(H('a'), H('b')));
    expect(tree.nodeAt(1, 1)).toEqual(H('c'));
    expect(tree.root()).toEqual(N(N(H('a'), H('b')), H('c')));
    expect(tree.root().equals(N(N(H('a'), H('b')), N(H('c'), H('c'))))).toBe(false);
  });

  it('promotes across several levels for five blocks', () => {
    const tree = buildTree(['a', 'b', 'c', 'd', 'e'], hasher);
    const abcd = N(N(H('a'), H('b')), N(H('c'), H('d')));

    expect([0, 1, 2, 3].map(level => tree.levelSize(level))).toEqual([5, 3, 2, 1]);
    expect(tree.nodeAt(1, 2)).toEqual(H('e'));
    expect(tree.nodeAt(2, 1)).toEqual(H('e'));
    expect(tree.root()).toEqual(N(abcd, H('e')));
  });

  it('keeps ceil(n / 2) digests per level', () => {
    for (let n = 1; n <= 33; n++) {
      const tree = buildTree(Array.from({ length: n }, (_, i) => `block-${i}`), hasher);
      for (let level = 1; level < tree.levelCount(); level++) {
        expect(tree.levelSize(level)).toBe(Math.ceil(tree.levelSize(level - 1) / 2));
      }
      expect(tree.levelSize(tree.levelCount() - 1)).toBe(1);
    }
  });

  it('is deterministic and order sensitive', () => {
    expect(buildTree(['x', 'y'], hasher).rootHex()).toBe(buildTree(['x', 'y'], hasher).rootHex());
    expect(buildTree(['x', 'y'], hasher).rootHex()).not.toBe(buildTree(['y', 'x'], hasher).rootHex());
  });

  it('treats strings as UTF-8 bytes', () => {
    expect(buildTree(['héllo'], hasher).root()).toEqual(buildTree([Buffer.from('héllo', 'utf8')], hasher).root());
  });

  it('rejects a primitive whose digest length changes', () => {
    const unstable = createHasherFromDigest('unstable', (data) => new Uint8Array(data.length === 0 ? 4 : 8));
    expect(() => buildTree(['a'], unstable)).toThrow(InvalidDigestError);
  });

  it('exposes build as the only static entry point', () => {
    expect(MerkleTree.build(['a', 'b', 'c'], hasher).root()).toEqual(buildTree(['a', 'b', 'c'], hasher).root());
    expect(() => MerkleTree.build([], hasher)).toThrow(EmptyInputError);
    expect(Object.getOwnPropertyNames(MerkleTree).filter(name => typeof Reflect.get(MerkleTree, name) === 'function'))
      .toEqual(['build']);
  });
});

describe('MerkleTree', () => {
  const tree = buildTree(['a', 'b', 'c'], hasher);

  it('returns leaf digests by index', () => {
    expect(tree.leafDigest(1)).toEqual(H('b'));
  });

  it('throws IndexOutOfRangeError on bad indices', () => {
    expect(() => tree.leafDigest(3)).toThrow(IndexOutOfRangeError);
    expect(() => tree.leafDigest(-1)).toThrow(IndexOutOfRangeError);
    expect(() => tree.leafDigest(1.5)).toThrow(IndexOutOfRangeError);
    expect(() => tree.leafData(3)).toThrow('Index out of range: leaf 3 (size 3)');
    expect(() => tree.levelSize(3)).toThrow(IndexOutOfRangeError);
    expect(() => tree.nodeAt(1, 2)).toThrow(IndexOutOfRangeError);
  });

  it('owns copies of its blocks and digests', () => {
    const input = Buffer.from('mutable');
    const owned = buildTree([input], hasher);
    input.fill(0);
    expect(owned.leafData(0).toString()).toBe('mutable');

    const root = owned.root();
    root.fill(0);
    expect(owned.root()).toEqual(H('mutable'));
  });

  it('iterates leaves in index order', () => {
    const leaves = Array.from(tree.leaves());
    expect(leaves.map(leaf => leaf.index)).toEqual([0, 1, 2]);
    expect(leaves.map(leaf => leaf.data.toString())).toEqual(['a', 'b', 'c']);
    expect(leaves[2].digest).toEqual(H('c'));
  });

  it('finds the first leaf with a digest', () => {
    const dup = buildTree(['a', 'b', 'a'], hasher);
    expect(dup.indexOfDigest(H('a'))).toBe(0);
    expect(dup.indexOfDigest(H('b'))).toBe(1);
    expect(dup.indexOfDigest(H('z'))).toBe(-1);
  });

  it('records the hasher it was built with', () => {
    expect(tree.algorithm).toBe('sha256');
    expect(tree.digestLength).toBe(32);
    expect(buildTree(['a'], createHasher('sha512')).root()).toHaveLength(64);
  });
});
