/**
 * Centralized application configuration
 */

import { SERIALIZATION } from '../constants.js';
import { getEnvironment, resetEnvironment } from './environment.js';
import type { Environment } from './environment.js';

export interface AppConfig {
  hashing: {
    algorithm: string;
  };
  logging: {
    level: Environment['LOG_LEVEL'];
    file?: string;
    console: boolean;
  };
  serialization: {
    proofVersion: typeof SERIALIZATION.PROOF_VERSION;
    treeVersion: typeof SERIALIZATION.TREE_VERSION;
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = getEnvironment();

  cachedConfig = {
    hashing: {
      algorithm: env.MERKLE_HASH_ALGORITHM
    },
    logging: {
      level: env.LOG_LEVEL,
      file: env.LOG_FILE,
      console: env.NODE_ENV === 'development'
    },
    serialization: {
      proofVersion: SERIALIZATION.PROOF_VERSION,
      treeVersion: SERIALIZATION.TREE_VERSION
    }
  };

  return cachedConfig;
}

/**
 * Drop cached environment and config so the next read sees process.env again
 */
export function resetConfig(): void {
  cachedConfig = null;
  resetEnvironment();
}
