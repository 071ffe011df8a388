import type { ProoflineConfig } from './types.js';

export const CONFIG_FILE_NAME = '.proofline.json';

export const DEFAULT_CONFIG: ProoflineConfig = {
  version: 1,
  engine: {
    defaultBudget: 10000,
    maxBudget: 1000000,
  },
  log: {
    level: 'info',
  },
};
