import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ScanProjectUseCase } from '../../application/ScanProjectUseCase.js';
import { summarizeReport } from '../../application/dto/ScanReport.js';
import { toUserMessage } from '../../domain/errors/DomainErrors.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: scanguard_scan
 * 對應 CLI: scanguard scan
 */
export function registerScanTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'scanguard_scan',
    'Scan a project directory inside its boundary and report file statistics',
    {
      root: z.string().describe('Project root directory'),
      maxDepth: z.number().int().min(0).optional().describe('Maximum directory depth (root is 0)'),
      maxFiles: z.number().int().positive().optional().describe('Maximum number of files to analyze'),
    },
    async ({ root, maxDepth, maxFiles }) => {
      try {
        const useCase = new ScanProjectUseCase(deps.classifier, {
          fs: deps.fs,
          forbiddenRoots: deps.forbiddenRoots,
          logger: deps.logger.child('ScanProjectUseCase'),
        });
        const report = useCase.scan(root, {
          maxDepth: maxDepth ?? deps.config.scan.maxDepth ?? undefined,
          maxFiles: maxFiles ?? deps.config.scan.maxFiles ?? undefined,
          skipSensitive: deps.config.scan.skipSensitive,
          countLinesFor: deps.config.scan.countLinesFor,
        });

        const { stats } = report;
        const lines: string[] = [
          '# Scan Results',
          '',
          `Project: ${report.projectPath}`,
          `Files: ${stats.totalFiles} (${stats.filesAnalyzed} analyzed)`,
          `Size: ${stats.totalSizeBytes} bytes`,
          `Lines: ${stats.totalLines}`,
        ];
        if (report.primaryLanguage) {
          lines.push(`Languages: ${report.languages.join(', ')}`);
        }
        lines.push('', ...summarizeReport(report));

        if (report.warnings.length > 0) {
          lines.push('', '## Warnings');
          for (const w of report.warnings) {
            lines.push(`  ⚠ ${w}`);
          }
        }

        return {
          content: [{ type: 'text' as const, text: lines.join('\n') }],
        };
      } catch (err) {
        deps.logger.warn('scanguard_scan failed', { error: err instanceof Error ? err.message : String(err) });
        return {
          content: [{ type: 'text' as const, text: `Scan failed: ${toUserMessage(err)}` }],
          isError: true,
        };
      }
    },
  );
}
