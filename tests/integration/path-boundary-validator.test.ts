import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { PathBoundaryValidator } from '../../src/infrastructure/security/PathBoundaryValidator.js';
import { ForbiddenRootPolicy } from '../../src/domain/value-objects/ForbiddenRootPolicy.js';
import {
  BoundaryViolationError,
  InaccessibleError,
  InvalidRootError,
  SymlinkAttackError,
  type BoundaryError,
} from '../../src/domain/errors/DomainErrors.js';
import { Logger } from '../../src/shared/Logger.js';

const logger = new Logger('test', 'error', () => undefined);

/**
 * Feature: Path boundary 驗證
 *
 * 任何候選路徑都必須被證明位於 project root 之內，
 * symlink 以最終目標判斷。
 */
describe('PathBoundaryValidator', () => {
  let base: string;
  let root: string;
  let outside: string;
  let validator: PathBoundaryValidator;

  beforeEach(() => {
    base = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'scanguard-pbv-')));
    root = path.join(base, 'project');
    outside = path.join(base, 'outside');

    fs.mkdirSync(path.join(root, 'src'), { recursive: true });
    fs.mkdirSync(outside);
    fs.writeFileSync(path.join(root, 'src', 'main.ts'), 'export {};\n');
    fs.writeFileSync(path.join(outside, 'secret.txt'), 'test-secret\n');
    fs.symlinkSync(outside, path.join(root, 'escape'));
    fs.symlinkSync(path.join(root, 'src'), path.join(root, 'alias'));

    validator = new PathBoundaryValidator(root, { logger });
  });

  afterEach(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  describe('construction', () => {
    it('should canonicalize the root', () => {
      expect(validator.root).toBe(root);
      expect(Object.isFrozen(validator.context)).toBe(true);
    });

    /**
     * Scenario: 系統目錄不可作為 root
     * Given root 為 /etc
     * When 建立 validator
     * Then 拋出 InvalidRootError（forbidden）
     */
    it('should refuse forbidden system roots', () => {
      expect(() => new PathBoundaryValidator('/etc', { logger })).toThrow(InvalidRootError);
      expect(() => new PathBoundaryValidator('/etc', { logger })).toThrow('Cannot analyze system directory: /etc');
    });

    it('should refuse roots that do not exist or are not directories', () => {
      const missing = path.join(base, 'missing');
      expect(() => new PathBoundaryValidator(missing, { logger }))
        .toThrow(`Project root does not exist: ${missing}`);

      const file = path.join(root, 'src', 'main.ts');
      expect(() => new PathBoundaryValidator(file, { logger }))
        .toThrow(`Project root is not a directory: ${file}`);
    });

    it('should honor a configured forbidden roots policy', () => {
      const forbiddenRoots = ForbiddenRootPolicy.fromPaths([base]);
      expect(() => new PathBoundaryValidator(root, { logger, forbiddenRoots })).toThrow(InvalidRootError);
    });
  });

  describe('validate', () => {
    it('should resolve relative paths against the root', () => {
      expect(validator.validate('src/main.ts')).toBe(path.join(root, 'src', 'main.ts'));
      expect(validator.validate('.')).toBe(root);
    });

    it('should return paths that are within the root', () => {
      for (const candidate of ['src', 'src/main.ts', 'alias', path.join(root, 'src')]) {
        expect(validator.isWithinRoot(validator.validate(candidate))).toBe(true);
      }
    });

    it('should reject ../ traversal', () => {
      expect(() => validator.validate('../outside/secret.txt')).toThrow(BoundaryViolationError);
    });

    it('should reject paths reached through an escaping directory symlink', () => {
      expect(() => validator.validate('escape/secret.txt')).toThrow(BoundaryViolationError);
    });

    /**
     * Scenario: `..` 接在指向 root 外的 symlink 之後
     * Given root/link → outside/inner，且 outside/x 存在
     * When 驗證 "link/../x"
     * Then 依實際目標 outside/x 判定越界，而非字面上的 root/x
     */
    it('should resolve .. after a symlink against the real target', () => {
      fs.mkdirSync(path.join(outside, 'inner'));
      fs.writeFileSync(path.join(outside, 'x'), 'test-secret\n');
      fs.writeFileSync(path.join(root, 'x'), 'decoy\n');
      fs.symlinkSync(path.join(outside, 'inner'), path.join(root, 'link'));

      expect(() => validator.validate('link/../x')).toThrow(BoundaryViolationError);
      expect(() => validator.validate(path.join(root, 'link') + '/../x')).toThrow(BoundaryViolationError);
      expect(() => validator.validate('link/../new.txt', { mustExist: false })).toThrow(BoundaryViolationError);
    });

    it('should follow symlinks that stay inside the root', () => {
      expect(validator.validate('alias')).toBe(path.join(root, 'src'));
      expect(validator.validate('alias', { followSymlinks: true })).toBe(path.join(root, 'src'));
    });

    /**
     * Scenario: 指向 root 外的 symlink
     * Given root/escape → outside
     * When followSymlinks 為 true
     * Then 拋出 SymlinkAttackError
     * When followSymlinks 為 false
     * Then 拋出 InaccessibleError（symlink-escape）
     */
    it('should treat escaping symlinks as an attack only when following', () => {
      expect(() => validator.validate('escape', { followSymlinks: true })).toThrow(SymlinkAttackError);

      let caught: unknown;
      try {
        validator.validate('escape');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InaccessibleError);
      expect(caught).toMatchObject({ reason: 'symlink-escape' });
    });

    it('should require existence unless told otherwise', () => {
      expect(() => validator.validate('src/new.ts')).toThrow(InaccessibleError);
      expect(validator.validate('src/new.ts', { mustExist: false })).toBe(path.join(root, 'src', 'new.ts'));
      expect(validator.validate('a/b/c.ts', { mustExist: false })).toBe(path.join(root, 'a', 'b', 'c.ts'));
    });

    it('should still check the boundary for missing paths', () => {
      expect(() => validator.validate('escape/new.txt', { mustExist: false })).toThrow(BoundaryViolationError);
      expect(() => validator.validate('../elsewhere.txt', { mustExist: false })).toThrow(BoundaryViolationError);
    });

    it('should be idempotent', () => {
      const first = validator.validate('alias');
      expect(validator.validate(first)).toBe(first);
      expect(validator.validate('alias')).toBe(first);
    });

    it('should return identical results for concurrent callers', async () => {
      const results = await Promise.all(
        Array.from({ length: 8 }, async () => validator.validate('src/main.ts')),
      );
      expect(new Set(results)).toEqual(new Set([path.join(root, 'src', 'main.ts')]));
    });
  });

  describe('resolve', () => {
    it('should return a result instead of throwing', () => {
      const result = validator.resolve('../outside/secret.txt');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('BoundaryViolation');
      }
    });

    it('should report symlink loops as inaccessible', () => {
      fs.symlinkSync(path.join(root, 'self'), path.join(root, 'self'));

      const result = validator.resolve('self');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toMatchObject({ kind: 'Inaccessible', reason: 'symlink-loop' });
      }
    });

    it('should report broken symlinks as inaccessible', () => {
      fs.symlinkSync(path.join(root, 'gone'), path.join(root, 'dangling'));

      const result = validator.resolve('dangling');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('Inaccessible');
      }
    });
  });

  describe('isWithinRoot', () => {
    it('should count the root itself as inside', () => {
      expect(validator.isWithinRoot(root)).toBe(true);
    });

    it('should not be fooled by a sibling sharing the prefix', () => {
      expect(validator.isWithinRoot(`${root}-sibling/file.txt`)).toBe(false);
      expect(validator.isWithinRoot(path.join(root, '..'))).toBe(false);
    });
  });

  describe('safeIterdir', () => {
    it('should list canonical children and skip escaping symlinks', () => {
      const skipped: Array<[string, BoundaryError]> = [];
      const children = validator.safeIterdir(root, (p, error) => skipped.push([p, error]));

      // alias 解析為 src 的正規化路徑
      expect(children).toEqual([path.join(root, 'src'), path.join(root, 'src')]);
      expect(skipped).toHaveLength(1);
      expect(skipped[0][0]).toBe(path.join(root, 'escape'));
      expect(skipped[0][1]).toMatchObject({ kind: 'Inaccessible', reason: 'symlink-escape' });
    });

    it('should reject a start directory outside the root', () => {
      expect(() => validator.safeIterdir(outside)).toThrow(BoundaryViolationError);
    });

    it('should reject a file as directory', () => {
      expect(() => validator.safeIterdir('src/main.ts')).toThrow(InaccessibleError);
    });
  });
});
