import type { FileSystemPort } from '../../domain/ports/FileSystemPort.js';
import type { WalkEntry } from '../../domain/entities/WalkEntry.js';
import { InaccessibleError, causeFromErrno } from '../../domain/errors/DomainErrors.js';
import type { PathBoundaryValidator, SkipObserver } from './PathBoundaryValidator.js';
import { NodeFileSystemAdapter } from '../fs/NodeFileSystemAdapter.js';
import { Logger } from '../../shared/Logger.js';

export interface WalkOptions {
  /** 最大遞迴深度；start 目錄為 0，undefined 表示不限 */
  maxDepth?: number;
  /** 每個被略過的路徑都會通知（warning log 之外） */
  onSkip?: SkipObserver;
}

interface PendingDir {
  dir: string;
  depth: number;
}

/**
 * 有深度上限的惰性目錄走訪
 *
 * - 以明確的 work-list 取代遞迴，深層目錄樹不受呼叫堆疊限制
 * - 前序深度優先，子項目依名稱排序，輸出順序固定
 * - 單一子樹無法存取時只略過該子樹，其餘兄弟照常走訪
 * - 每個正規化目錄只產出一次（symlink 指回祖先不會形成迴圈），
 *   但經由較淺的路徑再次到達時會依新深度繼續展開
 * - generator 由呼叫端驅動；停止取值後不再有任何檔案系統存取
 */
export class BoundedTreeWalker {
  private readonly fs: FileSystemPort;
  private readonly logger: Logger;

  constructor(
    private readonly validator: PathBoundaryValidator,
    fs?: FileSystemPort,
    logger?: Logger,
  ) {
    this.fs = fs ?? new NodeFileSystemAdapter();
    this.logger = logger ?? new Logger('BoundedTreeWalker');
  }

  /**
   * @param start - 起點目錄（相對路徑以 project root 為基準）
   * @throws BoundaryError 起點本身不存在或越界（呼叫端明確指定的路徑）
   */
  *walk(start: string, options: WalkOptions = {}): Generator<WalkEntry, void, undefined> {
    const { maxDepth, onSkip } = options;
    const origin = this.validator.validate(start, { mustExist: true });

    const skip: SkipObserver = (skippedPath, error) => {
      onSkip?.(skippedPath, error);
    };

    const stack: PendingDir[] = [{ dir: origin, depth: 0 }];
    // 每個正規化目錄到達過的最小深度；較淺的再次到達需重新展開子樹
    const shallowest = new Map<string, number>();

    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined) break;
      const { dir, depth } = next;

      const seenDepth = shallowest.get(dir);
      if (seenDepth !== undefined && seenDepth <= depth) {
        this.logger.debug('Directory already visited, skipping', { path: dir });
        continue;
      }
      shallowest.set(dir, depth);

      // 重新展開時不再重複產出或通知
      const firstVisit = seenDepth === undefined;
      const report: SkipObserver = firstVisit ? skip : () => undefined;

      if (!this.validator.isDirectory(dir)) {
        const error = new InaccessibleError(dir, 'not-directory');
        this.logger.warn('Skipping inaccessible path', { path: dir, error: error.message });
        report(dir, error);
        continue;
      }

      const listing = this.validator.listChildren(dir, report);
      if (!listing.ok) {
        report(dir, listing.error);
        continue;
      }

      const subdirectories: string[] = [];
      const subdirPaths: string[] = [];
      const files: string[] = [];
      const filePaths: string[] = [];

      for (const child of listing.children) {
        let isDir: boolean;
        let isFile: boolean;
        try {
          const stat = this.fs.stat(child.path);
          isDir = stat.isDirectory();
          isFile = stat.isFile();
        } catch (err) {
          // 走訪期間被刪除或權限變更
          const error = new InaccessibleError(child.path, causeFromErrno(err), undefined, { cause: err });
          this.logger.warn('Error walking directory entry', { path: child.path, error: error.message });
          report(child.path, error);
          continue;
        }

        if (isDir) {
          subdirectories.push(child.name);
          subdirPaths.push(child.path);
        } else if (isFile) {
          files.push(child.name);
          filePaths.push(child.path);
        }
      }

      if (firstVisit) {
        yield { directory: dir, subdirectories, files, filePaths };
      }

      if (maxDepth !== undefined && depth + 1 > maxDepth) continue;
      for (let i = subdirPaths.length - 1; i >= 0; i--) {
        stack.push({ dir: subdirPaths[i], depth: depth + 1 });
      }
    }
  }
}
