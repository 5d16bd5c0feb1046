import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ScanGuardConfig } from '../config/types.js';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import type { ForbiddenRootPolicy } from '../domain/value-objects/ForbiddenRootPolicy.js';
import type { SensitiveContentClassifier } from '../infrastructure/security/SensitiveContentClassifier.js';
import type { Logger } from '../shared/Logger.js';
import { registerScanTool } from './tools/ScanTool.js';
import { registerAuditTool } from './tools/AuditTool.js';
import { registerClassifyTool } from './tools/ClassifyTool.js';

/**
 * MCP Server Factory
 *
 * 設計意圖：建立 MCP server 實例並註冊所有工具。
 * 工具與 CLI 指令對應；security 類錯誤只回傳通用訊息。
 */

export interface McpDependencies {
  config: ScanGuardConfig;
  classifier: SensitiveContentClassifier;
  fs: FileSystemPort;
  forbiddenRoots: ForbiddenRootPolicy;
  logger: Logger;
}

export const SERVER_VERSION = '0.1.0';

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'scanguard', version: SERVER_VERSION },
    { instructions: buildInstructions() },
  );

  registerScanTool(server, deps);
  registerAuditTool(server, deps);
  registerClassifyTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(): string {
  return [
    'scanguard: Boundary-enforced project scanning. Sensitive files are never read.',
    '',
    'Available tools:',
    '- scanguard_scan: Walk a project inside its root and report statistics',
    '- scanguard_audit: List sensitive files and directories (names only)',
    '- scanguard_classify: Classify paths as sensitive or safe without touching the filesystem',
    '',
    'Recommended workflow:',
    '1. scanguard_audit to see what will be skipped',
    '2. scanguard_scan for statistics on the remaining files',
    '3. scanguard_classify before reading any individual file',
  ].join('\n');
}
