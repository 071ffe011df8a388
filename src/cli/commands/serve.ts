import type { Command } from 'commander';
import path from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { loadConfig, resolvePreludePath, type PartialConfig } from '../../config/ConfigLoader.js';
import { EngineFaultError } from '../../domain/errors/DomainErrors.js';
import { KernelEngine } from '../../infrastructure/kernel/KernelEngine.js';
import { loadPrelude } from '../../infrastructure/kernel/PreludeLoader.js';
import { createProtocolServer } from '../../protocol/ProtocolServer.js';
import {
  createStreamWriter,
  ExitCode,
  exitCodeFor,
  runSessionLoop,
} from '../../protocol/transports/SessionLoop.js';
import { isLogLevel, Logger } from '../../shared/Logger.js';

export interface SessionCliOptions {
  repoRoot: string;
  prelude?: string;
  budget?: string;
  logLevel?: string;
}

/** 將 CLI 選項轉為設定覆蓋值 */
export function toConfigOverrides(opts: SessionCliOptions): PartialConfig {
  const overrides: PartialConfig = {};
  if (opts.prelude) {
    overrides.engine = { preludePath: path.resolve(opts.prelude) };
  }
  if (opts.budget !== undefined) {
    const budget = Number(opts.budget);
    if (!Number.isInteger(budget) || budget <= 0) {
      throw new Error(`--budget must be a positive integer, got ${opts.budget}`);
    }
    overrides.engine = { ...overrides.engine, defaultBudget: budget };
  }
  if (opts.logLevel !== undefined) {
    if (!isLogLevel(opts.logLevel)) {
      throw new Error(`--log-level must be one of debug, info, warn, error, got ${opts.logLevel}`);
    }
    overrides.log = { level: opts.logLevel };
  }
  return overrides;
}

/**
 * 載入設定與 prelude，在 input/output 上執行 session，回傳程序結束碼
 */
export async function runSession(
  opts: SessionCliOptions,
  input: Readable,
  output: Writable,
): Promise<number> {
  const repoRoot = path.resolve(opts.repoRoot);
  const config = loadConfig(repoRoot, toConfigOverrides(opts));
  const logger = new Logger('cli', config.log.level);

  const preludePath = resolvePreludePath(config, repoRoot);
  const prelude = loadPrelude(preludePath);
  logger.info('Prelude loaded', {
    prelude: preludePath ?? 'bundled',
    declarations: prelude.environment.size,
    goals: prelude.goals.length,
  });

  const engine = new KernelEngine(prelude, logger.child('KernelEngine'));
  const writer = createStreamWriter(output);
  const server = createProtocolServer({
    engine,
    writer,
    budget: { defaultBudget: config.engine.defaultBudget, maxBudget: config.engine.maxBudget },
    logger: logger.child('ProtocolServer'),
  });

  try {
    const { outcome } = await runSessionLoop(
      input,
      server.dispatcher,
      server.session,
      logger.child('SessionLoop'),
      writer,
    );
    return exitCodeFor(outcome);
  } catch (err) {
    if (err instanceof EngineFaultError) {
      logger.error('Session terminated by engine fault', { error: err.message });
      return ExitCode.EngineFault;
    }
    throw err;
  }
}

/** 等待 output 排空後結束程序 */
export function exitAfterFlush(output: Writable, code: number): void {
  output.write('', () => process.exit(code));
}

/**
 * 註冊 serve 指令（預設指令）
 *
 * 用法：
 *   proofline serve [--repo-root .] [--prelude file.json] [--budget 10000] [--log-level info]
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve', { isDefault: true })
    .description('Run a proof session over stdin/stdout')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--prelude <path>', 'Prelude JSON file (declarations and initial goals)')
    .option('--budget <number>', 'Default step budget for applyStep')
    .option('--log-level <level>', 'Log level: debug, info, warn, error')
    .action(async (opts: SessionCliOptions) => {
      const code = await runSession(opts, process.stdin, process.stdout);
      exitAfterFlush(process.stdout, code);
    });
}
