import path from 'node:path';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import { ForbiddenRootPolicy } from '../domain/value-objects/ForbiddenRootPolicy.js';
import { PathBoundaryValidator } from '../infrastructure/security/PathBoundaryValidator.js';
import type { SensitiveContentClassifier } from '../infrastructure/security/SensitiveContentClassifier.js';
import { NodeFileSystemAdapter } from '../infrastructure/fs/NodeFileSystemAdapter.js';
import { Logger } from '../shared/Logger.js';
import type { ProjectStats, ScanReport } from './dto/ScanReport.js';

/** 掃描輸入設定 */
export interface ScanProjectOptions {
  /** 最大目錄深度（root 為 0） */
  maxDepth?: number;
  /** 最多分析的非敏感檔案數 */
  maxFiles?: number;
  /** 預設 true */
  skipSensitive?: boolean;
  /** 需要計算行數的副檔名 */
  countLinesFor?: readonly string[];
}

export interface ScanProjectDependencies {
  fs?: FileSystemPort;
  forbiddenRoots?: ForbiddenRootPolicy;
  logger?: Logger;
}

const NO_EXTENSION = '.no_extension';
const TEST_DIRECTORIES = ['tests', 'test', '__tests__'];
const TEST_FILE = /(\.(test|spec)\.)|(^test_)|(_test\.)/i;

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  '.py': 'python',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.java': 'java',
  '.kt': 'kotlin',
  '.go': 'go',
  '.rs': 'rust',
  '.rb': 'ruby',
  '.php': 'php',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.cs': 'csharp',
  '.swift': 'swift',
  '.sh': 'shell',
};

/**
 * 專案掃描用例
 *
 * 消費 BoundedTreeWalker 的輸出，每個檔案先分類再決定是否碰觸：
 * - 敏感（link 名稱或其目標任一符合）：只記錄相對路徑，不 stat、不讀取
 * - 非敏感：stat 取大小、依副檔名計數、文字檔計算行數
 *
 * 上限（maxFiles）由本用例負責：達到上限即停止向 walker 取值。
 */
export class ScanProjectUseCase {
  private readonly fs: FileSystemPort;
  private readonly forbiddenRoots: ForbiddenRootPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly classifier: SensitiveContentClassifier,
    deps: ScanProjectDependencies = {},
  ) {
    this.fs = deps.fs ?? new NodeFileSystemAdapter();
    this.forbiddenRoots = deps.forbiddenRoots ?? ForbiddenRootPolicy.defaults();
    this.logger = deps.logger ?? new Logger('ScanProjectUseCase');
  }

  /**
   * @throws InvalidRootError root 無效時在走訪前中止
   */
  scan(projectRoot: string, options: ScanProjectOptions = {}): ScanReport {
    const { maxDepth, maxFiles, skipSensitive = true, countLinesFor = [] } = options;
    const lineExtensions = new Set(countLinesFor.map((e) => e.toLowerCase()));

    const validator = new PathBoundaryValidator(projectRoot, {
      fs: this.fs,
      forbiddenRoots: this.forbiddenRoots,
      logger: this.logger.child('PathBoundaryValidator'),
    });
    const root = validator.root;
    this.logger.info('Starting project scan', { root, maxDepth, maxFiles });

    const stats: ProjectStats = {
      totalFiles: 0,
      totalSizeBytes: 0,
      totalLines: 0,
      filesByExtension: {},
      hasTests: false,
      isGitRepo: false,
      filesAnalyzed: 0,
    };
    const sensitiveFilesSkipped: string[] = [];
    const inaccessiblePaths: string[] = [];
    const warnings: string[] = [];
    let sawTestFile = false;
    let stoppedEarly = false;

    const onSkip = (skippedPath: string): void => {
      inaccessiblePaths.push(path.relative(root, skippedPath) || '.');
    };

    walk: for (const entry of validator.safeWalk(root, maxDepth, onSkip)) {
      for (const [index, filename] of entry.files.entries()) {
        if (maxFiles !== undefined && stats.filesAnalyzed >= maxFiles) {
          this.logger.info('Reached max files limit', { maxFiles });
          warnings.push(`Stopped scanning early, hit max files limit of ${maxFiles}.`);
          stoppedEarly = true;
          break walk;
        }

        // symlink 的 link 名稱與最終目標都要分類；讀取只走正規化目標
        const target = entry.filePaths[index];
        const relative = path.relative(root, path.join(entry.directory, filename));
        const targetRelative = path.relative(root, target);
        if (TEST_FILE.test(filename)) sawTestFile = true;

        if (skipSensitive && (this.classifier.isSensitive(relative) || this.classifier.isSensitive(targetRelative))) {
          sensitiveFilesSkipped.push(relative);
          stats.totalFiles++;
          continue;
        }

        stats.totalFiles++;
        stats.filesAnalyzed++;
        this.collectFileStats(target, relative, stats, lineExtensions, warnings);
      }
    }

    stats.hasTests = sawTestFile
      || TEST_DIRECTORIES.some((d) => this.fs.exists(path.join(root, d)));
    stats.isGitRepo = this.fs.exists(path.join(root, '.git'));

    const languages = this.detectLanguages(stats.filesByExtension);

    this.logger.info('Scan complete', {
      root,
      totalFiles: stats.totalFiles,
      sensitiveSkipped: sensitiveFilesSkipped.length,
      inaccessible: inaccessiblePaths.length,
    });

    return {
      projectPath: root,
      timestamp: new Date().toISOString(),
      stats,
      languages,
      primaryLanguage: languages[0],
      sensitiveFilesSkipped,
      inaccessiblePaths,
      warnings,
      stoppedEarly,
    };
  }

  /** stat 與行數統計；filePath 為正規化目標，副檔名依列出的名稱。讀取失敗只記 warning */
  private collectFileStats(
    filePath: string,
    relative: string,
    stats: ProjectStats,
    lineExtensions: ReadonlySet<string>,
    warnings: string[],
  ): void {
    const ext = path.extname(relative).toLowerCase() || NO_EXTENSION;
    try {
      const stat = this.fs.stat(filePath);
      stats.totalSizeBytes += stat.size;
      stats.filesByExtension[ext] = (stats.filesByExtension[ext] ?? 0) + 1;

      if (lineExtensions.has(ext)) {
        stats.totalLines += countLines(this.fs.readFile(filePath));
      }
    } catch (err) {
      this.logger.debug('Error reading file', { path: filePath, error: String(err) });
      warnings.push(`Could not read: ${relative}`);
    }
  }

  /** 依檔案數由多到少排序；同數量時依名稱 */
  private detectLanguages(filesByExtension: Record<string, number>): string[] {
    const counts = new Map<string, number>();
    for (const [ext, count] of Object.entries(filesByExtension)) {
      const language = LANGUAGE_BY_EXTENSION[ext];
      if (language) counts.set(language, (counts.get(language) ?? 0) + count);
    }
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .map(([language]) => language);
  }
}

/** 結尾的換行不另算一行 */
export function countLines(content: string): number {
  if (content === '') return 0;
  const lines = content.split(/\r\n|\r|\n/);
  return /(\r\n|\r|\n)$/.test(content) ? lines.length - 1 : lines.length;
}
