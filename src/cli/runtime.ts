import { loadConfig, type PartialConfig, type ScanGuardConfig } from '../config/ConfigLoader.js';
import { ForbiddenRootPolicy } from '../domain/value-objects/ForbiddenRootPolicy.js';
import { SensitiveContentClassifier } from '../infrastructure/security/SensitiveContentClassifier.js';
import { NodeFileSystemAdapter } from '../infrastructure/fs/NodeFileSystemAdapter.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import { Logger } from '../shared/Logger.js';

/** 一次 CLI / MCP 呼叫共用的依賴；classifier 只建立一次並以參照傳遞 */
export interface Runtime {
  config: ScanGuardConfig;
  logger: Logger;
  fs: FileSystemPort;
  forbiddenRoots: ForbiddenRootPolicy;
  classifier: SensitiveContentClassifier;
}

/**
 * @param configDir - 讀取 .scanguard.json 的目錄（呼叫端工作目錄，不是被掃描的 project）
 */
export function createRuntime(configDir: string, overrides?: PartialConfig): Runtime {
  const config = loadConfig(configDir, overrides);
  const logger = new Logger('scanguard', config.logging.level);
  const fs = new NodeFileSystemAdapter();

  const forbiddenRoots = config.boundary.forbiddenRoots
    ? ForbiddenRootPolicy.fromPaths(config.boundary.forbiddenRoots)
    : ForbiddenRootPolicy.defaults();

  const classifier = new SensitiveContentClassifier({
    customPatterns: config.sensitive.customPatterns,
    customDirectories: config.sensitive.customDirectories,
    customExtensions: config.sensitive.customExtensions,
    fs,
    logger: logger.child('SensitiveContentClassifier'),
  });

  return { config, logger, fs, forbiddenRoots, classifier };
}
