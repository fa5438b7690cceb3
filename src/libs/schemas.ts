import { z } from "zod";
import { SERIALIZATION, VALIDATION_PATTERNS } from "../constants.js";

export const HexDigest = z.string()
  .min(2, "Digest must not be empty")
  .regex(VALIDATION_PATTERNS.HEX, "Digest must be lowercase hex");

export const Base64Data = z.string()
  .regex(VALIDATION_PATTERNS.BASE64, "Invalid base64 format")
  .refine((value) => value.length % 4 === 0, "Base64 length must be a multiple of 4");

export const Algorithm = z.string().regex(VALIDATION_PATTERNS.ALGORITHM, "Invalid hash algorithm name");

export const ProofNodeEnvelope = z.object({
  digest: HexDigest,
  side: z.enum(["left", "right"])
});

export const ProofEnvelope = z.object({
  version: z.literal(SERIALIZATION.PROOF_VERSION),
  algorithm: Algorithm,
  leafIndex: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  leafData: Base64Data,
  leafDigest: HexDigest,
  nodes: z.array(ProofNodeEnvelope),
  root: HexDigest
});

export const TreeEnvelope = z.object({
  version: z.literal(SERIALIZATION.TREE_VERSION),
  algorithm: Algorithm,
  leaves: z.array(Base64Data).min(1, "A tree needs at least one leaf"),
  root: HexDigest
});

export type ProofEnvelopeT = z.infer<typeof ProofEnvelope>;
export type TreeEnvelopeT = z.infer<typeof TreeEnvelope>;
