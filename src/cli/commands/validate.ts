import type { Command } from 'commander';
import { PathBoundaryValidator } from '../../infrastructure/security/PathBoundaryValidator.js';
import { ScanGuardError } from '../../domain/errors/DomainErrors.js';
import { createRuntime } from '../runtime.js';

interface ValidateCommandOptions {
  root: string;
  followSymlinks: boolean;
  allowMissing: boolean;
}

/**
 * 註冊 validate 指令
 *
 * 用法：
 *   scanguard validate <path> [--root .] [--follow-symlinks] [--allow-missing]
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate <path>')
    .description('Resolve a path and verify it stays inside the project root')
    .option('--root <path>', 'Project root directory', '.')
    .option('--follow-symlinks', 'Fail hard when a symlink escapes the root', false)
    .option('--allow-missing', 'Accept paths that do not exist yet', false)
    .action((candidate: string, opts: ValidateCommandOptions) => {
      const runtime = createRuntime(process.cwd());
      const validator = new PathBoundaryValidator(opts.root, {
        fs: runtime.fs,
        forbiddenRoots: runtime.forbiddenRoots,
        logger: runtime.logger.child('PathBoundaryValidator'),
      });

      try {
        const canonical = validator.validate(candidate, {
          mustExist: !opts.allowMissing,
          followSymlinks: opts.followSymlinks,
        });
        process.stdout.write(canonical + '\n');
      } catch (err) {
        // 細節只進 log，使用者只看到通用訊息
        if (err instanceof ScanGuardError) {
          runtime.logger.warn('Path validation failed', { code: err.code, kind: err.kind, detail: err.message });
        }
        throw err;
      }
    });
}
