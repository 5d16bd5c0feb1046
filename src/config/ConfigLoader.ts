import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import { LOG_LEVELS, isLogLevel } from '../shared/Logger.js';
import type { ScanGuardConfig, PartialConfig } from './types.js';

export type { ScanGuardConfig, PartialConfig } from './types.js';

/** 設定檔的形狀；未知欄位直接拒絕 */
const FileConfigSchema = z.object({
  version: z.number().int().optional(),
  scan: z.object({
    maxDepth: z.number().nullable().optional(),
    maxFiles: z.number().nullable().optional(),
    skipSensitive: z.boolean().optional(),
    countLinesFor: z.array(z.string()).optional(),
  }).strict().optional(),
  boundary: z.object({
    forbiddenRoots: z.array(z.string().min(1)).nullable().optional(),
  }).strict().optional(),
  sensitive: z.object({
    customPatterns: z.array(z.string()).optional(),
    customDirectories: z.array(z.string().min(1)).optional(),
    customExtensions: z.array(z.string()).optional(),
  }).strict().optional(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  }).strict().optional(),
}).strict();

/** 淺層合併單一區段：partial 中非 undefined 的欄位覆蓋 base */
function mergeSection<T extends object>(base: T, partial?: Partial<T>): T {
  const result = { ...base };
  if (!partial) return result;
  for (const key of Object.keys(partial) as (keyof T)[]) {
    const val = partial[key];
    if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function merge(base: ScanGuardConfig, partial: PartialConfig): ScanGuardConfig {
  return {
    version: partial.version ?? base.version,
    scan: mergeSection(base.scan, partial.scan),
    boundary: mergeSection(base.boundary, partial.boundary),
    sensitive: mergeSection(base.sensitive, partial.sensitive),
    logging: mergeSection(base.logging, partial.logging),
  };
}

function parseLimit(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/** 環境變數覆蓋 config：SCANGUARD_LOG_LEVEL / SCANGUARD_MAX_FILES / SCANGUARD_MAX_DEPTH */
function applyEnvOverrides(config: ScanGuardConfig): void {
  const level = process.env.SCANGUARD_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`SCANGUARD_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.logging.level = level;
  }

  const maxFiles = process.env.SCANGUARD_MAX_FILES;
  if (maxFiles) config.scan.maxFiles = parseLimit('SCANGUARD_MAX_FILES', maxFiles);

  const maxDepth = process.env.SCANGUARD_MAX_DEPTH;
  if (maxDepth) config.scan.maxDepth = parseLimit('SCANGUARD_MAX_DEPTH', maxDepth);
}

/** 驗證設定值的合法性 */
function validate(config: ScanGuardConfig): void {
  const { maxDepth, maxFiles } = config.scan;
  if (maxDepth !== null && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
    throw new Error('maxDepth must be a non-negative integer or null');
  }
  if (maxFiles !== null && (!Number.isInteger(maxFiles) || maxFiles <= 0)) {
    throw new Error('maxFiles must be a positive integer or null');
  }

  for (const pattern of config.sensitive.customPatterns) {
    try {
      new RegExp(pattern, 'i');
    } catch {
      throw new Error(`invalid custom pattern: ${pattern}`);
    }
  }

  for (const ext of config.sensitive.customExtensions) {
    if (!ext.startsWith('.') || ext.length < 2) {
      throw new Error(`custom extensions must start with ".": ${ext}`);
    }
  }

  if (config.boundary.forbiddenRoots !== null && config.boundary.forbiddenRoots.length === 0) {
    throw new Error('forbiddenRoots must not be empty (use null for the built-in list)');
  }
}

function readConfigFile(configPath: string): PartialConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid config file ${configPath}: ${reason}`, { cause: err });
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${configPath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .scanguard.json（若存在）並合併到預設值上
 *
 * 設定檔只從呼叫端的目錄讀取，從不讀取被掃描的 project（不可信任）
 *
 * @param configDir - 呼叫端的工作目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  configDir: string,
  overrides?: PartialConfig,
): ScanGuardConfig {
  let fileConfig: PartialConfig = {};

  const configPath = path.join(configDir, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    fileConfig = readConfigFile(configPath);
  }

  // 合併順序：defaults < file config < overrides
  let merged = merge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = merge(merged, overrides);
  }

  // 環境變數優先於檔案設定
  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
