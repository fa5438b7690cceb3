import { createHash, getHashes } from 'crypto';
import { getConfig } from '../config/index.js';
import { HASH_CONFIG, HASH_PREFIX } from '../constants.js';
import { HashPrimitiveUnavailableError } from './errors.js';
import type { Digest, DigestFunction, Hasher } from '../types/index.js';

const LEAF_PREFIX = Buffer.from([HASH_PREFIX.LEAF]);
const NODE_PREFIX = Buffer.from([HASH_PREFIX.NODE]);

function measureDigest(algorithm: string, digest: DigestFunction): number {
  let length: number;
  try {
    length = digest(new Uint8Array(0)).length;
  } catch (error) {
    throw new HashPrimitiveUnavailableError(algorithm, error);
  }
  if (length === 0) {
    throw new HashPrimitiveUnavailableError(algorithm);
  }
  return length;
}

class DomainSeparatedHasher implements Hasher {
  readonly digestLength: number;

  constructor(readonly algorithm: string, private readonly digest: DigestFunction) {
    this.digestLength = measureDigest(algorithm, digest);
  }

  hashLeaf(data: Uint8Array): Digest {
    return this.hash(Buffer.concat([LEAF_PREFIX, data]));
  }

  hashNode(left: Uint8Array, right: Uint8Array): Digest {
    // order matters: H(0x01 || left || right)
    return this.hash(Buffer.concat([NODE_PREFIX, left, right]));
  }

  private hash(input: Buffer): Digest {
    const out = this.digest(input);
    return Buffer.isBuffer(out) ? out : Buffer.from(out);
  }
}

/**
 * Hasher backed by a digest from the runtime's crypto module.
 * Throws HashPrimitiveUnavailableError when the algorithm is not offered.
 */
/**
 * Name the runtime lists for `algorithm`: an exact match first, then a
 * case-insensitive one ('SHA256' -> 'sha256', 'rsa-sha256' -> 'RSA-SHA256').
 */
function resolveAlgorithm(algorithm: string): string | undefined {
  const hashes = getHashes();
  if (hashes.includes(algorithm)) return algorithm;
  const wanted = algorithm.toLowerCase();
  return hashes.find(name => name.toLowerCase() === wanted);
}

export function createHasher(algorithm: string = HASH_CONFIG.DEFAULT_ALGORITHM): Hasher {
  const name = resolveAlgorithm(algorithm);
  if (!name) {
    throw new HashPrimitiveUnavailableError(algorithm);
  }
  return new DomainSeparatedHasher(name, (data) => createHash(name).update(data).digest());
}

/**
 * Hasher over an injected digest primitive, for algorithms the
 * crypto module does not provide.
 */
export function createHasherFromDigest(algorithm: string, digest: DigestFunction): Hasher {
  return new DomainSeparatedHasher(algorithm, digest);
}

let defaultHasher: Hasher | null = null;

/**
 * Hasher for the configured algorithm (MERKLE_HASH_ALGORITHM), cached
 * until the configuration names a different one.
 */
export function getDefaultHasher(): Hasher {
  const { algorithm } = getConfig().hashing;
  if (!defaultHasher || defaultHasher.algorithm.toLowerCase() !== algorithm.toLowerCase()) {
    defaultHasher = createHasher(algorithm);
  }
  return defaultHasher;
}
