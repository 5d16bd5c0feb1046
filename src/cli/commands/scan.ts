import type { Command } from 'commander';
import { ScanProjectUseCase } from '../../application/ScanProjectUseCase.js';
import { ReportFormatter, parseOutputFormat } from '../formatters/ReportFormatter.js';
import { parseNonNegativeInt, parsePositiveInt } from '../options.js';
import { createRuntime } from '../runtime.js';

interface ScanCommandOptions {
  root: string;
  maxDepth?: number;
  maxFiles?: number;
  includeSensitive: boolean;
  format: string;
}

/** 註冊 scan 指令 */
export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Scan a project tree within its boundary and report statistics')
    .option('--root <path>', 'Project root directory', '.')
    .option('--max-depth <n>', 'Maximum directory depth (root is 0)', parseNonNegativeInt)
    .option('--max-files <n>', 'Maximum number of files to analyze', parsePositiveInt)
    .option('--include-sensitive', 'Analyze sensitive files instead of skipping them', false)
    .option('--format <format>', 'Output format: json, text or markdown', 'text')
    .action((opts: ScanCommandOptions) => {
      const format = parseOutputFormat(opts.format);
      const runtime = createRuntime(process.cwd(), {
        scan: {
          maxDepth: opts.maxDepth,
          maxFiles: opts.maxFiles,
          skipSensitive: opts.includeSensitive ? false : undefined,
        },
      });
      const { config } = runtime;

      const useCase = new ScanProjectUseCase(runtime.classifier, {
        fs: runtime.fs,
        forbiddenRoots: runtime.forbiddenRoots,
        logger: runtime.logger.child('ScanProjectUseCase'),
      });

      const report = useCase.scan(opts.root, {
        maxDepth: config.scan.maxDepth ?? undefined,
        maxFiles: config.scan.maxFiles ?? undefined,
        skipSensitive: config.scan.skipSensitive,
        countLinesFor: config.scan.countLinesFor,
      });

      process.stdout.write(new ReportFormatter().formatScanReport(report, format) + '\n');
    });
}
