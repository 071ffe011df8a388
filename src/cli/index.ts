#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { registerServeCommand } from './commands/serve.js';
import { registerReplayCommand } from './commands/replay.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('proofline')
  .description('Line-oriented JSON session driver for branchable proof construction')
  .version(version);

registerServeCommand(program);
registerReplayCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exit(0);
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
