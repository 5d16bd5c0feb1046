import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { PathBoundaryValidator } from '../../src/infrastructure/security/PathBoundaryValidator.js';
import { BoundedTreeWalker } from '../../src/infrastructure/security/BoundedTreeWalker.js';
import { NodeFileSystemAdapter } from '../../src/infrastructure/fs/NodeFileSystemAdapter.js';
import { BoundaryViolationError, type BoundaryError } from '../../src/domain/errors/DomainErrors.js';
import type { WalkEntry } from '../../src/domain/entities/WalkEntry.js';
import { Logger } from '../../src/shared/Logger.js';

const logger = new Logger('test', 'error', () => undefined);

/** 指定目錄的 readdir 回報 EACCES（測試以 root 身分執行時 chmod 不會生效） */
class DenyingFileSystem extends NodeFileSystemAdapter {
  constructor(private readonly denied: string) {
    super();
  }

  readdir(dirPath: string): string[] {
    if (dirPath === this.denied) {
      throw Object.assign(new Error(`EACCES: permission denied, scandir '${dirPath}'`), { code: 'EACCES' });
    }
    return super.readdir(dirPath);
  }
}

function write(file: string, content: string = ''): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
}

/**
 * Feature: 有深度上限的惰性走訪
 *
 * 走訪只產出 root 之內的路徑；單一子樹失敗不影響兄弟目錄。
 */
describe('BoundedTreeWalker', () => {
  let base: string;
  let root: string;

  beforeEach(() => {
    base = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'scanguard-walk-')));
    root = path.join(base, 'project');
    fs.mkdirSync(root);
  });

  afterEach(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  /**
   * Scenario: 指向 root 外的 symlink 被略過
   * Given root 含 safe/file.txt、.env、.ssh/id_rsa 與 evil → root 外的檔案
   * When safeWalk(root)
   * Then 產出 safe/file.txt，不產出 evil
   */
  it('should never yield paths outside the root', () => {
    write(path.join(root, 'safe', 'file.txt'), 'hello\n');
    write(path.join(root, '.env'), 'TOKEN=test-secret\n');
    write(path.join(root, '.ssh', 'id_rsa'), 'test-key\n');
    write(path.join(base, 'outside', 'passwd'), 'test\n');
    fs.symlinkSync(path.join(base, 'outside', 'passwd'), path.join(root, 'evil'));

    const skipped: Array<[string, BoundaryError]> = [];
    const validator = new PathBoundaryValidator(root, { logger });
    const entries = [...validator.safeWalk(root, undefined, (p, error) => skipped.push([p, error]))];

    expect(entries).toEqual<WalkEntry[]>([
      {
        directory: root,
        subdirectories: ['.ssh', 'safe'],
        files: ['.env'],
        filePaths: [path.join(root, '.env')],
      },
      {
        directory: path.join(root, '.ssh'),
        subdirectories: [],
        files: ['id_rsa'],
        filePaths: [path.join(root, '.ssh', 'id_rsa')],
      },
      {
        directory: path.join(root, 'safe'),
        subdirectories: [],
        files: ['file.txt'],
        filePaths: [path.join(root, 'safe', 'file.txt')],
      },
    ]);
    expect(skipped.map(([p]) => p)).toEqual([path.join(root, 'evil')]);
    expect(skipped[0][1]).toMatchObject({ kind: 'Inaccessible', reason: 'symlink-escape' });
  });

  it('should stop descending past maxDepth', () => {
    write(path.join(root, 'top.txt'));
    write(path.join(root, 'a', 'one.txt'));
    write(path.join(root, 'a', 'b', 'two.txt'));
    const validator = new PathBoundaryValidator(root, { logger });

    const depth0 = [...validator.safeWalk(root, 0)].map((e) => e.directory);
    const depth1 = [...validator.safeWalk(root, 1)].map((e) => e.directory);
    const unbounded = [...validator.safeWalk(root)].map((e) => e.directory);

    expect(depth0).toEqual([root]);
    expect(depth1).toEqual([root, path.join(root, 'a')]);
    expect(unbounded).toEqual([root, path.join(root, 'a'), path.join(root, 'a', 'b')]);
  });

  it('should walk depth-first with children in name order', () => {
    write(path.join(root, 'b', 'x', 'f.txt'));
    write(path.join(root, 'a', 'f.txt'));
    write(path.join(root, 'c', 'f.txt'));
    const validator = new PathBoundaryValidator(root, { logger });

    const dirs = [...validator.safeWalk(root)].map((e) => path.relative(root, e.directory));

    expect(dirs).toEqual(['', 'a', 'b', path.join('b', 'x'), 'c']);
  });

  /**
   * Scenario: 走訪途中某個目錄無法讀取
   * Given root 含 a/、b/、c/，其中 b/ 回報 EACCES
   * When safeWalk(root)
   * Then b 被略過並通知，a 與 c 照常走訪
   */
  it('should omit an unreadable subtree and continue with siblings', () => {
    write(path.join(root, 'a', 'x.txt'));
    write(path.join(root, 'b', 'y.txt'));
    write(path.join(root, 'c', 'z.txt'));
    const denied = path.join(root, 'b');

    const skipped: Array<[string, BoundaryError]> = [];
    const validator = new PathBoundaryValidator(root, { logger, fs: new DenyingFileSystem(denied) });
    const entries = [...validator.safeWalk(root, undefined, (p, error) => skipped.push([p, error]))];

    expect(entries.map((e) => e.directory)).toEqual([root, path.join(root, 'a'), path.join(root, 'c')]);
    expect(entries[0].subdirectories).toEqual(['a', 'b', 'c']);
    expect(skipped).toHaveLength(1);
    expect(skipped[0][0]).toBe(denied);
    expect(skipped[0][1]).toMatchObject({ kind: 'Inaccessible', reason: 'permission-denied' });
  });

  it('should not loop on a symlink back to an ancestor', () => {
    write(path.join(root, 'sub', 'f.txt'));
    fs.symlinkSync(root, path.join(root, 'sub', 'loop'));
    const validator = new PathBoundaryValidator(root, { logger });

    const entries = [...validator.safeWalk(root)];

    expect(entries).toEqual<WalkEntry[]>([
      { directory: root, subdirectories: ['sub'], files: [], filePaths: [] },
      {
        directory: path.join(root, 'sub'),
        subdirectories: ['loop'],
        files: ['f.txt'],
        filePaths: [path.join(root, 'sub', 'f.txt')],
      },
    ]);
  });

  it('should report the canonical target of a symlinked file', () => {
    write(path.join(root, 'docs', 'guide.md'), '# Guide\n');
    fs.symlinkSync(path.join(root, 'docs', 'guide.md'), path.join(root, 'README.md'));
    const validator = new PathBoundaryValidator(root, { logger });

    const [top] = [...validator.safeWalk(root, 0)];

    expect(top.files).toEqual(['README.md']);
    expect(top.filePaths).toEqual([path.join(root, 'docs', 'guide.md')]);
  });

  /**
   * Scenario: symlink 先以較深的深度到達某目錄
   * Given a/link → z，且 z/y/f.txt 存在，maxDepth 為 2
   * When 經由 a/link 先到達 z（深度 2），之後才從 root 到達 z（深度 1）
   * Then z 只產出一次，但 z/y 仍依較淺的深度被走訪
   */
  it('should re-expand a directory reached again at a shallower depth', () => {
    write(path.join(root, 'z', 'y', 'f.txt'));
    fs.mkdirSync(path.join(root, 'a'));
    fs.symlinkSync(path.join(root, 'z'), path.join(root, 'a', 'link'));
    const validator = new PathBoundaryValidator(root, { logger });

    const dirs = [...validator.safeWalk(root, 2)].map((e) => path.relative(root, e.directory));

    expect(dirs).toEqual(['', 'a', 'z', path.join('z', 'y')]);
  });

  it('should be lazy and touch nothing after the consumer stops', () => {
    write(path.join(root, 'a', 'f.txt'));
    write(path.join(root, 'b', 'f.txt'));
    const fsAdapter = new NodeFileSystemAdapter();
    const readdir = vi.spyOn(fsAdapter, 'readdir');
    const validator = new PathBoundaryValidator(root, { logger, fs: fsAdapter });

    const walk = validator.safeWalk(root);
    expect(readdir).not.toHaveBeenCalled();

    const first = walk.next();
    expect(first.done).toBe(false);
    expect(readdir).toHaveBeenCalledTimes(1);

    walk.return(undefined);
    expect(walk.next().done).toBe(true);
    expect(readdir).toHaveBeenCalledTimes(1);
  });

  it('should perform a fresh traversal on every call', () => {
    write(path.join(root, 'a', 'f.txt'));
    const validator = new PathBoundaryValidator(root, { logger });

    const first = [...validator.safeWalk(root)];
    write(path.join(root, 'b', 'g.txt'));
    const second = [...validator.safeWalk(root)];

    expect(first.map((e) => e.directory)).toEqual([root, path.join(root, 'a')]);
    expect(second.map((e) => e.directory)).toEqual([root, path.join(root, 'a'), path.join(root, 'b')]);
  });

  it('should throw when the start directory is outside the root', () => {
    const validator = new PathBoundaryValidator(root, { logger });
    const walker = new BoundedTreeWalker(validator, new NodeFileSystemAdapter(), logger);

    expect(() => [...walker.walk('..')]).toThrow(BoundaryViolationError);
  });

  it('should produce the same entries for concurrent walks', async () => {
    write(path.join(root, 'a', 'f.txt'));
    write(path.join(root, 'b', 'g.txt'));
    const validator = new PathBoundaryValidator(root, { logger });

    const [left, right] = await Promise.all([
      Promise.resolve().then(() => [...validator.safeWalk(root)]),
      Promise.resolve().then(() => [...validator.safeWalk(root)]),
    ]);

    expect(left).toEqual(right);
    expect(left).toHaveLength(3);
  });
});
