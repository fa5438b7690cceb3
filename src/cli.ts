#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, realpathSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { MerkleError } from './libs/errors.js';
import { createHasher, getDefaultHasher } from './libs/hasher.js';
import { generateProof, ProofVerifier } from './libs/proof.js';
import { Algorithm, HexDigest } from './libs/schemas.js';
import { decodeProof, encodeProof } from './libs/serialization.js';
import { buildTree } from './libs/tree.js';
import { logger } from './utils/logger.js';
import type { Hasher } from './types/index.js';

const CliConfigSchema = z.object({
  algorithm: Algorithm.optional()
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

export type CommonOptions = {
  algorithm?: string;
  config?: string;
};

export async function loadConfig(p: string): Promise<CliConfig> {
  const resolved = path.resolve(p);
  if (!existsSync(resolved)) {
    throw new Error(`Config not found: ${resolved}`);
  }
  const parsed = CliConfigSchema.safeParse(YAML.parse(await readFile(resolved, 'utf8')) ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid config ${resolved}:\n${issues.join('\n')}`);
  }
  return parsed.data;
}

/**
 * --algorithm wins over the YAML config, which wins over MERKLE_HASH_ALGORITHM.
 */
export async function resolveHasher(opts: CommonOptions): Promise<Hasher> {
  if (opts.algorithm) return createHasher(opts.algorithm);
  if (opts.config) {
    const cfg = await loadConfig(opts.config);
    if (cfg.algorithm) return createHasher(cfg.algorithm);
  }
  return getDefaultHasher();
}

async function readBlocks(files: string[]): Promise<Buffer[]> {
  return Promise.all(files.map(f => readFile(f)));
}

export async function computeRoot(files: string[], opts: CommonOptions = {}): Promise<string> {
  const tree = buildTree(await readBlocks(files), await resolveHasher(opts));
  return tree.rootHex();
}

export async function proveBlock(files: string[], index: number, opts: CommonOptions = {}): Promise<string> {
  const tree = buildTree(await readBlocks(files), await resolveHasher(opts));
  return encodeProof(generateProof(tree, index));
}

export async function verifyProofFile(proofPath: string, rootHex: string, opts: CommonOptions = {}): Promise<boolean> {
  const proof = decodeProof(await readFile(proofPath, 'utf8'));
  const verifier = new ProofVerifier(await resolveHasher(opts));
  return verifier.verify(proof, Buffer.from(rootHex, 'hex'));
}

function parseIndex(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return n;
}

function parseRoot(value: string): string {
  const lower = value.toLowerCase();
  if (!HexDigest.safeParse(lower).success) {
    throw new InvalidArgumentError('Not a hex digest.');
  }
  return lower;
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name('merkle')
    .description('Build Merkle trees over files and prove or verify inclusion')
    .option('--algorithm <name>', 'hash algorithm (default: MERKLE_HASH_ALGORITHM or sha256)')
    .option('--config <path>', 'YAML config file');

  program
    .command('root')
    .description('print the root digest of the tree over the given files, in order')
    .argument('<files...>', 'one block per file')
    .action(async (files: string[]) => {
      console.log(await computeRoot(files, program.opts<CommonOptions>()));
    });

  program
    .command('prove')
    .description('print an inclusion proof for one of the files')
    .requiredOption('--index <n>', 'zero-based leaf index', parseIndex)
    .option('--out <path>', 'write the proof to a file instead of stdout')
    .argument('<files...>', 'one block per file')
    .action(async (files: string[], opts: { index: number; out?: string }) => {
      const encoded = await proveBlock(files, opts.index, program.opts<CommonOptions>());
      if (opts.out) {
        await writeFile(opts.out, `${encoded}\n`, 'utf8');
      } else {
        console.log(encoded);
      }
    });

  program
    .command('verify')
    .description('check a proof file against a trusted root')
    .requiredOption('--proof <path>', 'encoded proof')
    .requiredOption('--root <hex>', 'trusted root digest', parseRoot)
    .action(async (opts: { proof: string; root: string }) => {
      const valid = await verifyProofFile(opts.proof, opts.root, program.opts<CommonOptions>());
      console.log(valid ? 'valid' : 'invalid');
      if (!valid) process.exitCode = 1;
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    if (error instanceof MerkleError) {
      logger.error('cli', 'command_failed', { error_code: error.code });
      console.error(`error [${error.code}]: ${error.message}`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }
}

const entry = process.argv[1];
if (entry && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 2;
  });
}
