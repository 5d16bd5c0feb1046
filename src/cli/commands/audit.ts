import type { Command } from 'commander';
import { AuditSensitiveUseCase } from '../../application/AuditSensitiveUseCase.js';
import { ReportFormatter, parseOutputFormat } from '../formatters/ReportFormatter.js';
import { createRuntime } from '../runtime.js';

interface AuditCommandOptions {
  root: string;
  recursive: boolean;
  format: string;
}

/** 註冊 audit 指令 */
export function registerAuditCommand(program: Command): void {
  program
    .command('audit')
    .description('List sensitive files and directories without reading them')
    .option('--root <path>', 'Project root directory', '.')
    .option('--no-recursive', 'Only inspect the top level of the root')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((opts: AuditCommandOptions) => {
      const format = parseOutputFormat(opts.format, ['json', 'text']);
      const runtime = createRuntime(process.cwd());
      const useCase = new AuditSensitiveUseCase(runtime.classifier, {
        fs: runtime.fs,
        forbiddenRoots: runtime.forbiddenRoots,
      });

      const result = useCase.audit(opts.root, opts.recursive);

      const output = format === 'json'
        ? new ReportFormatter().formatObject(result, format)
        : result.report;
      process.stdout.write(output + '\n');
    });
}
