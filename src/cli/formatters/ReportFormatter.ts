import type { ScanReport } from '../../application/dto/ScanReport.js';
import { summarizeReport } from '../../application/dto/ScanReport.js';
import type { SensitivityVerdict } from '../../domain/value-objects/SensitivityVerdict.js';

export type OutputFormat = 'json' | 'text' | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text', 'markdown'];

export function parseOutputFormat(value: string, allowed: readonly OutputFormat[] = OUTPUT_FORMATS): OutputFormat {
  const match = allowed.find((f) => f === value);
  if (!match) {
    throw new Error(`Unsupported format "${value}". Expected one of: ${allowed.join(', ')}`);
  }
  return match;
}

export interface ClassifiedPath {
  path: string;
  verdict: SensitivityVerdict;
}

/**
 * 報告格式化器
 *
 * - json：完整結構
 * - text：平展為 key: value 行
 * - markdown：掃描報告專用
 */
export class ReportFormatter {
  formatScanReport(report: ScanReport, format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(report, null, 2);
    if (format === 'markdown') return this.scanMarkdown(report);
    return [this.flattenToText(report), '', ...summarizeReport(report)].join('\n');
  }

  formatVerdicts(items: ClassifiedPath[], format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(items, null, 2);
    return items
      .map(({ path, verdict }) => (
        verdict.isSensitive
          ? `${path}: sensitive (${verdict.reason ?? 'unknown'})`
          : `${path}: safe`
      ))
      .join('\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  private scanMarkdown(report: ScanReport): string {
    const { stats } = report;
    const lines = [
      '# Project Scan Report',
      '',
      `**Generated**: ${report.timestamp}`,
      `**Project**: ${report.projectPath}`,
      '',
      '## Project Statistics',
      '',
      `- **Total Files**: ${stats.totalFiles}`,
      `- **Files Analyzed**: ${stats.filesAnalyzed}`,
      `- **Total Size**: ${stats.totalSizeBytes.toLocaleString('en-US')} bytes`,
      `- **Total Lines**: ${stats.totalLines.toLocaleString('en-US')}`,
      `- **Has Tests**: ${stats.hasTests ? 'Yes' : 'No'}`,
      `- **Git Repository**: ${stats.isGitRepo ? 'Yes' : 'No'}`,
      '',
      '### Files by Extension',
      '',
    ];

    for (const [ext, count] of Object.entries(stats.filesByExtension).sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(`- \`${ext}\`: ${count} files`);
    }

    if (report.languages.length > 0) {
      lines.push('', '## Languages', '');
      if (report.primaryLanguage) lines.push(`**Primary Language**: ${report.primaryLanguage}`, '');
      lines.push(`**Languages**: ${report.languages.join(', ')}`);
    }

    lines.push('', '## Security', '', ...summarizeReport(report).map((s) => `- ${s}`));
    if (report.sensitiveFilesSkipped.length > 0) {
      lines.push('', '### Sensitive Files Skipped', '');
      for (const file of report.sensitiveFilesSkipped) lines.push(`- \`${file}\``);
    }

    if (report.warnings.length > 0) {
      lines.push('', '## Warnings', '');
      for (const w of report.warnings) lines.push(`- ${w}`);
    }

    return lines.join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val}`;
      })
      .join('\n');
  }
}
