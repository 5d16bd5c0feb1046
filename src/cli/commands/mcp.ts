import type { Command } from 'commander';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { createRuntime } from '../runtime.js';

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   scanguard mcp
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start MCP server over stdio for LLM tool integration')
    .action(async () => {
      const runtime = createRuntime(process.cwd());
      const server = createMcpServer(runtime);

      // stdio 模式：持續執行直到 stdin 關閉
      await startStdioTransport(server);
      runtime.logger.info('MCP server listening on stdio');

      process.on('SIGINT', () => {
        void server.close().finally(() => process.exit(0));
      });
    });
}
