#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { toUserMessage } from '../domain/errors/DomainErrors.js';
import { registerScanCommand } from './commands/scan.js';
import { registerAuditCommand } from './commands/audit.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerClassifyCommand } from './commands/classify.js';
import { registerMcpCommand } from './commands/mcp.js';

// 版本號從 package.json 讀取
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('scanguard')
  .description('Boundary-enforced project scanning that never reads sensitive files')
  .version(version);

registerScanCommand(program);
registerAuditCommand(program);
registerValidateCommand(program);
registerClassifyCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      // commander 已自行輸出訊息
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${toUserMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
