/**
 * Application constants
 */

// Domain separation prefixes
export const HASH_PREFIX = {
  LEAF: 0x00,
  NODE: 0x01
} as const;

// Hashing defaults
export const HASH_CONFIG = {
  DEFAULT_ALGORITHM: 'sha256',
  DIGEST_ENCODING: 'hex',
  DATA_ENCODING: 'base64'
} as const;

// Interchange format
export const SERIALIZATION = {
  PROOF_VERSION: 1,
  TREE_VERSION: 1
} as const;

// Validation patterns
export const VALIDATION_PATTERNS = {
  HEX: /^(?:[0-9a-f]{2})*$/,
  BASE64: /^[A-Za-z0-9+/]*={0,2}$/,
  ALGORITHM: /^[A-Za-z0-9-]+$/
} as const;

// Logging
export const LOG_LIMITS = {
  MAX_STRING_LENGTH: 200
} as const;

// Error messages
export const ERROR_MESSAGES = {
  EMPTY_INPUT: 'Cannot build a Merkle tree from zero blocks',
  INDEX_OUT_OF_RANGE: 'Index out of range',
  LEAF_DIGEST_MISMATCH: 'Proof leaf digest does not match its leaf data',
  HASH_PRIMITIVE_UNAVAILABLE: 'Hash primitive unavailable',
  INVALID_DIGEST: 'Hash primitive returned a digest of unexpected length',
  PROOF_DECODE: 'Malformed serialized proof or tree'
} as const;
