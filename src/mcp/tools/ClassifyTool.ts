import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: scanguard_classify
 * 對應 CLI: scanguard classify <paths...>
 * 只看路徑字串，不存取檔案系統。
 */
export function registerClassifyTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'scanguard_classify',
    'Classify paths as sensitive or safe by name and location',
    {
      paths: z.array(z.string()).min(1).describe('Paths to classify'),
    },
    async ({ paths }) => {
      const lines = paths.map((p) => {
        const verdict = deps.classifier.classify(p);
        return verdict.isSensitive
          ? `${p}: sensitive (${verdict.reason ?? 'unknown'})`
          : `${p}: safe`;
      });

      return {
        content: [{ type: 'text' as const, text: lines.join('\n') }],
      };
    },
  );
}
