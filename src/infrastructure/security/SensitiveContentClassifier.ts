import path from 'node:path';
import type { FileSystemPort } from '../../domain/ports/FileSystemPort.js';
import {
  NOT_SENSITIVE,
  sensitive,
  type SensitivityVerdict,
} from '../../domain/value-objects/SensitivityVerdict.js';
import { errnoCode } from '../../domain/errors/DomainErrors.js';
import { loadSensitivePatternTable, type SensitivePatternTable } from './SensitivePatternTable.js';
import { NodeFileSystemAdapter } from '../fs/NodeFileSystemAdapter.js';
import { Logger } from '../../shared/Logger.js';

export interface ClassifierOptions {
  /** 額外的檔名 regex（不分大小寫），附加在內建規則之後 */
  customPatterns?: string[];
  /** 額外的敏感目錄名稱 */
  customDirectories?: string[];
  /** 額外的敏感副檔名（例如 `.vault`） */
  customExtensions?: string[];
  table?: SensitivePatternTable;
  fs?: FileSystemPort;
  logger?: Logger;
}

export interface SensitiveMatch {
  path: string;
  reason: string;
  type: 'file' | 'directory';
}

export interface PartitionResult {
  safe: string[];
  sensitive: string[];
}

interface PatternRule {
  regex: RegExp;
  description: string;
  /** 含 `/` 的規則比對路徑尾段，其餘只比對檔名 */
  pathScoped: boolean;
}

const CUSTOM_PATTERN_DESCRIPTION = 'Custom sensitive pattern';
const REPORT_RULE = '='.repeat(60);

/**
 * Sensitive Content Classifier
 *
 * 只依路徑字串判斷是否敏感，從不開啟或讀取檔案內容。
 * 評估順序固定，reason 取第一個命中的類別：
 * 1. 任一路徑區段屬於敏感目錄
 * 2. 檔名符合規則表（依表格順序）
 * 3. 副檔名屬於敏感副檔名
 */
export class SensitiveContentClassifier {
  private readonly rules: readonly PatternRule[];
  private readonly directories: ReadonlySet<string>;
  private readonly extensions: ReadonlySet<string>;
  private readonly fs: FileSystemPort;
  private readonly logger: Logger;

  constructor(options: ClassifierOptions = {}) {
    const table = options.table ?? loadSensitivePatternTable();
    this.fs = options.fs ?? new NodeFileSystemAdapter();
    this.logger = options.logger ?? new Logger('SensitiveContentClassifier');

    this.rules = [
      ...table.patterns.map(({ pattern, description }) => toRule(pattern, description)),
      ...(options.customPatterns ?? []).map((p) => toRule(p, CUSTOM_PATTERN_DESCRIPTION)),
    ];

    this.directories = new Set(
      [...table.directories, ...(options.customDirectories ?? [])].map((d) => d.toLowerCase()),
    );

    this.extensions = new Set(
      [...table.extensions, ...(options.customExtensions ?? [])]
        .map((e) => (e.startsWith('.') ? e : `.${e}`).toLowerCase()),
    );

    this.logger.debug('Classifier initialized', {
      patterns: this.rules.length,
      directories: this.directories.size,
      extensions: this.extensions.size,
    });
  }

  classify(candidate: string): SensitivityVerdict {
    const segments = candidate.split(/[\\/]+/).filter((s) => s !== '' && s !== '.');
    const basename = segments.length > 0 ? segments[segments.length - 1] : '';

    // 1. 敏感目錄
    for (const segment of segments) {
      if (this.directories.has(segment.toLowerCase())) {
        return sensitive(`In sensitive directory: ${segment}`, 'directory');
      }
    }

    // 2. 檔名規則
    const filename = basename.toLowerCase();
    const posixPath = segments.join('/').toLowerCase();
    for (const rule of this.rules) {
      if (rule.regex.test(rule.pathScoped ? posixPath : filename)) {
        return sensitive(rule.description, 'filename-pattern');
      }
    }

    // 3. 副檔名
    const ext = path.extname(basename);
    if (ext && this.extensions.has(ext.toLowerCase())) {
      return sensitive(`Sensitive file extension: ${ext}`, 'extension');
    }

    return NOT_SENSITIVE;
  }

  isSensitive(candidate: string): boolean {
    return this.classify(candidate).isSensitive;
  }

  /** @returns [是否略過內容, 原因] */
  shouldSkipContent(candidate: string): [boolean, string | undefined] {
    const verdict = this.classify(candidate);
    return [verdict.isSensitive, verdict.reason];
  }

  /** 只看路徑字串，不存取檔案系統 */
  partition(paths: readonly string[]): PartitionResult {
    const result: PartitionResult = { safe: [], sensitive: [] };
    for (const p of paths) {
      (this.isSensitive(p) ? result.sensitive : result.safe).push(p);
    }
    if (result.sensitive.length > 0) {
      this.logger.info('Filtered sensitive files', {
        filtered: result.sensitive.length,
        total: paths.length,
      });
    }
    return result;
  }

  filterSafe(paths: readonly string[]): string[] {
    return this.partition(paths).safe;
  }

  /**
   * 稽核用：獨立於 BoundedTreeWalker 走訪目錄並回報敏感項目
   * 不追蹤 symlink；路徑以 root 相對的形式分類，避免 root 的祖先目錄誤判
   */
  scanDirectory(root: string, recursive: boolean = true): SensitiveMatch[] {
    const base = path.resolve(root);
    const matches: SensitiveMatch[] = [];
    const stack: string[] = [base];

    while (stack.length > 0) {
      const dir = stack.pop();
      if (dir === undefined) break;

      let names: string[];
      try {
        names = this.fs.readdir(dir);
      } catch (err) {
        this.logger.warn('Cannot read directory during audit', { path: dir, code: errnoCode(err) });
        continue;
      }

      const subdirs: string[] = [];
      for (const name of [...names].sort()) {
        const full = path.join(dir, name);
        let isDir: boolean;
        try {
          isDir = this.fs.lstat(full).isDirectory();
        } catch (err) {
          this.logger.warn('Cannot stat entry during audit', { path: full, code: errnoCode(err) });
          continue;
        }

        const verdict = this.classify(path.relative(base, full));
        if (verdict.isSensitive && verdict.reason) {
          matches.push({ path: full, reason: verdict.reason, type: isDir ? 'directory' : 'file' });
        }
        if (isDir && recursive) subdirs.push(full);
      }

      for (let i = subdirs.length - 1; i >= 0; i--) stack.push(subdirs[i]);
    }

    this.logger.info('Sensitive audit finished', { root: base, found: matches.length });
    return matches;
  }

  /** 依原因分組的略過報告 */
  createSkipReport(skipped: readonly string[]): string {
    if (skipped.length === 0) return 'No sensitive files skipped.';

    const byReason = new Map<string, string[]>();
    for (const file of skipped) {
      const reason = this.classify(file).reason ?? 'Unknown';
      const group = byReason.get(reason) ?? [];
      group.push(file);
      byReason.set(reason, group);
    }

    const lines = ['Sensitive Files Skipped for Privacy:', REPORT_RULE];
    for (const reason of [...byReason.keys()].sort()) {
      const files = byReason.get(reason) ?? [];
      lines.push('', `${reason} (${files.length} files):`);
      for (const file of [...files].sort()) {
        lines.push(`  - ${file}`);
      }
    }
    lines.push(
      '',
      REPORT_RULE,
      `Total: ${skipped.length} sensitive files protected`,
      '',
      'These files were NOT read or analyzed for your privacy and security.',
    );
    return lines.join('\n');
  }
}

function toRule(pattern: string, description: string): PatternRule {
  return {
    regex: new RegExp(pattern, 'i'),
    description,
    pathScoped: pattern.includes('/'),
  };
}
