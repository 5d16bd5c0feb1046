import type { LogLevel } from '../shared/Logger.js';

/** 掃描上限設定 */
export interface ScanConfig {
  /** 最大目錄深度（root 為 0），null 表示不限 */
  maxDepth: number | null;
  /** 最多分析的檔案數，null 表示不限 */
  maxFiles: number | null;
  /** 是否略過敏感檔案（預設 true） */
  skipSensitive: boolean;
  /** 需要計算行數的副檔名 */
  countLinesFor: string[];
}

/** 邊界設定 */
export interface BoundaryConfig {
  /** 覆蓋內建 forbidden roots；null 表示使用內建清單。結尾 `*` 代表前綴比對 */
  forbiddenRoots: string[] | null;
}

/** 敏感判定的自訂擴充（附加在內建規則之後） */
export interface SensitiveConfig {
  customPatterns: string[];
  customDirectories: string[];
  customExtensions: string[];
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface ScanGuardConfig {
  version: number;
  scan: ScanConfig;
  boundary: BoundaryConfig;
  sensitive: SensitiveConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof ScanGuardConfig]?: ScanGuardConfig[K] extends object
    ? Partial<ScanGuardConfig[K]>
    : ScanGuardConfig[K];
};
