import type { ScanGuardConfig } from './types.js';

export const CONFIG_FILE_NAME = '.scanguard.json';

export const DEFAULT_CONFIG: ScanGuardConfig = {
  version: 1,
  scan: {
    maxDepth: null,
    maxFiles: null,
    skipSensitive: true,
    countLinesFor: [
      '.py', '.js', '.ts', '.jsx', '.tsx', '.java', '.go', '.rs', '.rb', '.php',
      '.c', '.cpp', '.h', '.md', '.txt', '.yml', '.yaml', '.json', '.xml',
    ],
  },
  boundary: {
    forbiddenRoots: null,
  },
  sensitive: {
    customPatterns: [],
    customDirectories: [],
    customExtensions: [],
  },
  logging: {
    level: 'warn',
  },
};
