import { z } from "zod";
import { getConfig } from "../config/index.js";
import { HASH_CONFIG } from "../constants.js";
import { canonicalize } from "./canonical.js";
import { ProofDecodeError } from "./errors.js";
import { getDefaultHasher } from "./hasher.js";
import { freezeProof } from "./proof.js";
import { ProofEnvelope, TreeEnvelope } from "./schemas.js";
import { buildTree } from "./tree.js";
import type { MerkleTree } from "./tree.js";
import type { ProofEnvelopeT, TreeEnvelopeT } from "./schemas.js";
import type { Hasher, Proof } from "../types/index.js";

const hex = (digest: Buffer): string => digest.toString(HASH_CONFIG.DIGEST_ENCODING);
const fromHex = (value: string): Buffer => Buffer.from(value, HASH_CONFIG.DIGEST_ENCODING);
const base64 = (data: Buffer): string => data.toString(HASH_CONFIG.DATA_ENCODING);
const fromBase64 = (value: string): Buffer => Buffer.from(value, HASH_CONFIG.DATA_ENCODING);

function parseEnvelope<T extends z.ZodTypeAny>(schema: T, json: string): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ProofDecodeError([`json: ${error instanceof Error ? error.message : String(error)}`]);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ProofDecodeError(result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`));
  }
  return result.data;
}

export function proofToEnvelope(proof: Proof): ProofEnvelopeT {
  return {
    version: getConfig().serialization.proofVersion,
    algorithm: proof.algorithm,
    leafIndex: proof.leafIndex,
    leafData: base64(proof.leafData),
    leafDigest: hex(proof.leafDigest),
    nodes: proof.nodes.map(node => ({ digest: hex(node.digest), side: node.side })),
    root: hex(proof.root)
  };
}

/**
 * Canonical JSON for a proof: digests as hex, leaf data as base64.
 * Equal proofs encode to identical strings.
 */
export function encodeProof(proof: Proof): string {
  return canonicalize(proofToEnvelope(proof));
}

export function decodeProof(json: string): Proof {
  const envelope = parseEnvelope(ProofEnvelope, json);
  const width = envelope.leafDigest.length;
  const issues = envelope.nodes
    .map((node, i) => (node.digest.length === width ? null : `nodes.${i}.digest: length differs from leafDigest`))
    .filter((issue): issue is string => issue !== null);
  if (envelope.root.length !== width) {
    issues.push("root: length differs from leafDigest");
  }
  if (issues.length > 0) {
    throw new ProofDecodeError(issues);
  }

  return freezeProof({
    algorithm: envelope.algorithm,
    leafIndex: envelope.leafIndex,
    leafData: fromBase64(envelope.leafData),
    leafDigest: fromHex(envelope.leafDigest),
    nodes: envelope.nodes.map(node => ({ digest: fromHex(node.digest), side: node.side })),
    root: fromHex(envelope.root)
  });
}

export function treeToEnvelope(tree: MerkleTree): TreeEnvelopeT {
  return {
    version: getConfig().serialization.treeVersion,
    algorithm: tree.algorithm,
    leaves: Array.from(tree.leaves(), leaf => base64(leaf.data)),
    root: tree.rootHex()
  };
}

/**
 * Only the leaves are stored; decoding rebuilds every level and checks
 * the rebuilt root against the recorded one.
 */
export function encodeTree(tree: MerkleTree): string {
  return canonicalize(treeToEnvelope(tree));
}

export function decodeTree(json: string, hasher: Hasher = getDefaultHasher()): MerkleTree {
  const envelope = parseEnvelope(TreeEnvelope, json);
  if (envelope.algorithm !== hasher.algorithm) {
    throw new ProofDecodeError([`algorithm: tree uses ${envelope.algorithm}, hasher is ${hasher.algorithm}`]);
  }

  const tree = buildTree(envelope.leaves.map(fromBase64), hasher);
  if (tree.rootHex() !== envelope.root) {
    throw new ProofDecodeError([`root: rebuilt ${tree.rootHex()} does not match recorded ${envelope.root}`]);
  }
  return tree;
}
