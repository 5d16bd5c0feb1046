import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { AuditSensitiveUseCase } from '../../application/AuditSensitiveUseCase.js';
import { toUserMessage } from '../../domain/errors/DomainErrors.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: scanguard_audit
 * 對應 CLI: scanguard audit
 */
export function registerAuditTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'scanguard_audit',
    'List sensitive files and directories in a project without reading them',
    {
      root: z.string().describe('Project root directory'),
      recursive: z.boolean().optional().default(true).describe('Include subdirectories'),
    },
    async ({ root, recursive }) => {
      try {
        const useCase = new AuditSensitiveUseCase(deps.classifier, {
          fs: deps.fs,
          forbiddenRoots: deps.forbiddenRoots,
        });
        const result = useCase.audit(root, recursive);

        const lines = [`Found ${result.matches.length} sensitive items`, ''];
        for (const m of result.matches) {
          lines.push(`  - [${m.type}] ${m.path}: ${m.reason}`);
        }

        return {
          content: [{ type: 'text' as const, text: lines.join('\n') }],
        };
      } catch (err) {
        return {
          content: [{ type: 'text' as const, text: `Audit failed: ${toUserMessage(err)}` }],
          isError: true,
        };
      }
    },
  );
}
