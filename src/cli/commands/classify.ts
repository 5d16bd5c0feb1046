import type { Command } from 'commander';
import { ReportFormatter, parseOutputFormat } from '../formatters/ReportFormatter.js';
import { createRuntime } from '../runtime.js';

/** 註冊 classify 指令：只看路徑字串，不存取檔案系統 */
export function registerClassifyCommand(program: Command): void {
  program
    .command('classify <paths...>')
    .description('Classify paths as sensitive or safe by name and location (exit code 2 if any is sensitive)')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((paths: string[], opts: { format: string }) => {
      const format = parseOutputFormat(opts.format, ['json', 'text']);
      const { classifier } = createRuntime(process.cwd());

      const items = paths.map((p) => ({ path: p, verdict: classifier.classify(p) }));
      process.stdout.write(new ReportFormatter().formatVerdicts(items, format) + '\n');

      if (items.some((i) => i.verdict.isSensitive)) {
        process.exitCode = 2;
      }
    });
}
