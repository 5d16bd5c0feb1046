import path from 'node:path';
import type { FileSystemPort } from '../../domain/ports/FileSystemPort.js';
import type { BoundaryContext } from '../../domain/entities/BoundaryContext.js';
import { createBoundaryContext } from '../../domain/entities/BoundaryContext.js';
import { ForbiddenRootPolicy } from '../../domain/value-objects/ForbiddenRootPolicy.js';
import { resolved, rejected, unwrap, type PathResolution } from '../../domain/value-objects/PathResolution.js';
import {
  BoundaryViolationError,
  InaccessibleError,
  InvalidRootError,
  SymlinkAttackError,
  causeFromErrno,
  errnoCode,
  type BoundaryError,
} from '../../domain/errors/DomainErrors.js';
import { NodeFileSystemAdapter } from '../fs/NodeFileSystemAdapter.js';
import { BoundedTreeWalker } from './BoundedTreeWalker.js';
import type { WalkEntry } from '../../domain/entities/WalkEntry.js';
import { Logger } from '../../shared/Logger.js';

export interface ValidateOptions {
  /** 路徑必須存在（預設 true） */
  mustExist?: boolean;
  /** 呼叫端打算直接解參照此 symlink；越界時硬失敗（預設 false） */
  followSymlinks?: boolean;
}

export interface BoundaryOptions {
  forbiddenRoots?: ForbiddenRootPolicy;
  fs?: FileSystemPort;
  logger?: Logger;
}

/** 目錄中一個通過驗證的子項目 */
export interface ValidatedChild {
  /** 父目錄列出的名稱（symlink 時為 link 名稱） */
  name: string;
  /** 正規化路徑（symlink 時為其最終目標） */
  path: string;
}

export type SkipObserver = (skippedPath: string, error: BoundaryError) => void;

export type ChildListing =
  | { ok: true; children: ValidatedChild[] }
  | { ok: false; error: InaccessibleError };

/**
 * 驗證並正規化 project root
 *
 * 輸入的絕對路徑與解析後的正規化路徑都會比對 forbidden roots，
 * 避免系統目錄藉由 symlink（例如 macOS 的 /etc → /private/etc）繞過檢查。
 *
 * @returns 正規化後的 root
 * @throws InvalidRootError
 */
export function validateProjectRoot(projectRoot: string, options: BoundaryOptions = {}): string {
  const fs = options.fs ?? new NodeFileSystemAdapter();
  const forbidden = options.forbiddenRoots ?? ForbiddenRootPolicy.defaults();
  const absolute = path.resolve(projectRoot);

  if (forbidden.matches(absolute)) {
    throw new InvalidRootError(absolute, 'forbidden');
  }

  let canonical: string;
  try {
    canonical = fs.realpath(absolute);
  } catch (err) {
    throw new InvalidRootError(projectRoot, 'not-found', { cause: err });
  }

  if (!fs.stat(canonical).isDirectory()) {
    throw new InvalidRootError(projectRoot, 'not-directory');
  }

  if (forbidden.matches(canonical)) {
    throw new InvalidRootError(canonical, 'forbidden');
  }

  return canonical;
}

/**
 * Path Boundary Validator
 *
 * 證明（或否證）候選路徑位於固定的 project root 之內。
 * 兩個呼叫端對應兩種失敗策略：
 * - resolve()：回傳 PathResolution，走訪時用來「跳過」壞項目
 * - validate()：strict 版本，失敗直接拋出，用於呼叫端明確要解參照的路徑
 *
 * 建立後不持有任何可變狀態，可供多個走訪同時使用。
 */
export class PathBoundaryValidator {
  readonly context: BoundaryContext;
  private readonly fs: FileSystemPort;
  private readonly logger: Logger;

  /**
   * @param projectRoot - project root 目錄
   * @throws InvalidRootError root 不存在、不是目錄、或位於系統目錄之下
   */
  constructor(projectRoot: string, options: BoundaryOptions = {}) {
    this.fs = options.fs ?? new NodeFileSystemAdapter();
    this.logger = options.logger ?? new Logger('PathBoundaryValidator');

    const forbiddenRoots = options.forbiddenRoots ?? ForbiddenRootPolicy.defaults();
    const root = validateProjectRoot(projectRoot, { fs: this.fs, forbiddenRoots });
    this.context = createBoundaryContext(root, forbiddenRoots);

    this.logger.info('Boundary validator initialized', { root });
  }

  get root(): string {
    return this.context.root;
  }

  /** strict 驗證：成功回傳正規化路徑，否則拋出對應的 BoundaryError */
  validate(candidate: string, options: ValidateOptions = {}): string {
    return unwrap(this.resolve(candidate, options));
  }

  /** soft 驗證：永不因單一路徑的問題拋出 */
  resolve(candidate: string, options: ValidateOptions = {}): PathResolution {
    const { mustExist = true, followSymlinks = false } = options;
    // 不可先以字面正規化：`link/../x` 的 `..` 必須交給 realpath 依實際目標解析
    const absolute = path.isAbsolute(candidate) ? candidate : `${this.root}${path.sep}${candidate}`;

    // symlink 判斷必須在解析之前
    if (this.isSymlink(absolute)) {
      return this.resolveSymlink(absolute, followSymlinks);
    }

    const canonical = this.canonicalize(absolute);
    if (!canonical.ok) return canonical;

    if (!this.isWithinRoot(canonical.path)) {
      return rejected(new BoundaryViolationError(candidate, canonical.path, this.root));
    }

    if (mustExist && !this.fs.exists(canonical.path)) {
      return rejected(new InaccessibleError(candidate, 'not-found', 'path does not exist'));
    }

    return canonical;
  }

  /** 純粹的包含關係判斷（root 本身也算在內） */
  isWithinRoot(candidate: string): boolean {
    const relative = path.relative(this.root, path.resolve(this.root, candidate));
    if (relative === '') return true;
    if (path.isAbsolute(relative)) return false;
    return relative !== '..' && !relative.startsWith('..' + path.sep);
  }

  /**
   * 列出目錄的直接子項目，逐一以非追蹤 symlink 模式驗證
   * 驗證失敗的項目記錄 warning 後略過，不影響其他兄弟項目
   *
   * @throws BoundaryError 目錄本身無效（不存在、越界、不是目錄）
   */
  safeIterdir(directory: string, onSkip?: SkipObserver): string[] {
    const dir = this.validate(directory, { mustExist: true });
    if (!this.isDirectory(dir)) {
      throw new InaccessibleError(directory, 'not-directory');
    }

    const listing = this.listChildren(dir, onSkip);
    if (!listing.ok) {
      // 目錄無法讀取時只記錄，不拋出
      onSkip?.(dir, listing.error);
      return [];
    }
    return listing.children.map((c) => c.path);
  }

  /**
   * 以本 validator 過濾的惰性深度優先走訪，每次呼叫都是全新的走訪
   * @param maxDepth - undefined 表示不限深度
   */
  safeWalk(start: string, maxDepth?: number, onSkip?: SkipObserver): Generator<WalkEntry, void, undefined> {
    const walker = new BoundedTreeWalker(this, this.fs, this.logger.child('BoundedTreeWalker'));
    return walker.walk(start, { maxDepth, onSkip });
  }

  /**
   * 走訪內部使用：dir 必須是已驗證的正規化目錄
   * 讀取目錄本身失敗時回傳 ok: false，由呼叫端決定略過
   */
  listChildren(dir: string, onSkip?: SkipObserver): ChildListing {
    let names: string[];
    try {
      names = this.fs.readdir(dir);
    } catch (err) {
      const cause = causeFromErrno(err);
      this.logger.warn(
        cause === 'permission-denied' ? 'Permission denied reading directory' : 'Cannot read directory',
        { path: dir, code: errnoCode(err) },
      );
      return { ok: false, error: new InaccessibleError(dir, cause, undefined, { cause: err }) };
    }

    const children: ValidatedChild[] = [];
    for (const name of [...names].sort()) {
      const item = path.join(dir, name);
      const resolution = this.resolve(item, { mustExist: false, followSymlinks: false });
      if (!resolution.ok) {
        this.logger.warn('Skipping unsafe path', { path: item, kind: resolution.error.kind, error: resolution.error.message });
        onSkip?.(item, resolution.error);
        continue;
      }
      children.push({ name, path: resolution.path });
    }
    return { ok: true, children };
  }

  isDirectory(canonicalPath: string): boolean {
    try {
      return this.fs.stat(canonicalPath).isDirectory();
    } catch {
      return false;
    }
  }

  private isSymlink(absolute: string): boolean {
    try {
      return this.fs.lstat(absolute).isSymbolicLink();
    } catch {
      return false;
    }
  }

  /**
   * symlink 子演算法：realpath 一次追完整條鏈，只檢查最終目標
   */
  private resolveSymlink(link: string, followSymlinks: boolean): PathResolution {
    let target: string;
    try {
      target = this.fs.realpath(link);
    } catch (err) {
      const cause = causeFromErrno(err);
      this.logger.warn('Cannot resolve symlink', { path: link, code: errnoCode(err) });
      return rejected(new InaccessibleError(link, cause, 'cannot resolve symlink', { cause: err }));
    }

    if (!this.isWithinRoot(target)) {
      if (followSymlinks) {
        return rejected(new SymlinkAttackError(link, target, this.root));
      }
      this.logger.warn('Skipping symlink pointing outside project', { path: link, target });
      return rejected(new InaccessibleError(link, 'symlink-escape', 'symlink points outside project'));
    }

    this.logger.debug('Following safe symlink', { path: link, target });
    return resolved(target);
  }

  /**
   * 解析為正規化絕對路徑；尚不存在的尾段保留原字面，
   * 已存在的最深祖先則完整解析 symlink
   */
  private canonicalize(absolute: string): PathResolution {
    const pending: string[] = [];
    let current = absolute;

    for (;;) {
      try {
        const real = this.fs.realpath(current);
        return resolved(pending.length > 0 ? path.join(real, ...pending.reverse()) : real);
      } catch (err) {
        const code = errnoCode(err);
        if (code !== 'ENOENT' && code !== 'ENOTDIR') {
          return rejected(new InaccessibleError(absolute, causeFromErrno(err), code, { cause: err }));
        }
        // 存在但無法解析：斷掉的 symlink 夾在路徑中間
        if (this.isSymlink(current)) {
          return rejected(new InaccessibleError(absolute, 'not-found', 'broken symlink in path'));
        }
      }

      const parent = path.dirname(current);
      if (parent === current) {
        return rejected(new InaccessibleError(absolute, 'not-found'));
      }
      pending.push(path.basename(current));
      current = parent;
    }
  }
}
