import type { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { exitAfterFlush, runSession, type SessionCliOptions } from './serve.js';

/**
 * 註冊 replay 指令：以檔案中的 request 行取代 stdin
 *
 * 用法：
 *   proofline replay requests.jsonl [--repo-root .] [--prelude file.json]
 */
export function registerReplayCommand(program: Command): void {
  program
    .command('replay <file>')
    .description('Run a proof session over the request lines of a file')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--prelude <path>', 'Prelude JSON file (declarations and initial goals)')
    .option('--budget <number>', 'Default step budget for applyStep')
    .option('--log-level <level>', 'Log level: debug, info, warn, error')
    .action(async (file: string, opts: SessionCliOptions) => {
      const input = fs.createReadStream(path.resolve(file), { encoding: 'utf-8' });
      const code = await runSession(opts, input, process.stdout);
      input.destroy();
      exitAfterFlush(process.stdout, code);
    });
}
