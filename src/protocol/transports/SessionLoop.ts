import { once } from 'node:events';
import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { SessionStatus } from '../../domain/entities/ProofSession.js';
import { Logger } from '../../shared/Logger.js';
import type { Dispatcher, LineWriter } from '../Dispatcher.js';

export type LoopOutcome = 'committed' | 'input-closed';

export interface LoopResult {
  outcome: LoopOutcome;
  /** 已處理的輸入行數 */
  lines: number;
}

/** 程序結束碼 */
export const ExitCode = {
  Committed: 0,
  EngineFault: 1,
  InputClosed: 2,
} as const;

export function exitCodeFor(outcome: LoopOutcome): number {
  return outcome === 'committed' ? ExitCode.Committed : ExitCode.InputClosed;
}

/** 可等待 backpressure 解除的行輸出端 */
export interface StreamLineWriter extends LineWriter {
  /** 上一次寫入超過 highWaterMark 時，等到 stream 送出 'drain' */
  drained(): Promise<void>;
}

/** 將回應逐行寫入 stream（預設 stdout） */
export function createStreamWriter(stream: Writable = process.stdout): StreamLineWriter {
  let blocked = false;
  return {
    writeLine(line: string): void {
      blocked = !stream.write(line + '\n');
    },
    async drained(): Promise<void> {
      if (!blocked) return;
      await once(stream, 'drain');
      blocked = false;
    },
  };
}

/**
 * Session Loop
 *
 * 設計意圖：兩狀態（Running / Stopped）的終端狀態機。
 * 一次讀一行、完整處理後才讀下一行；commit 成功後停止讀取。
 * 給定 output 時，回應行觸發 backpressure 後先等輸出排空再讀下一行。
 * EngineFaultError 由 dispatcher 往上拋出，結束 loop。
 */
export async function runSessionLoop(
  input: Readable,
  dispatcher: Dispatcher,
  session: SessionStatus,
  logger: Logger = new Logger('SessionLoop'),
  output?: Pick<StreamLineWriter, 'drained'>,
): Promise<LoopResult> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let lines = 0;

  try {
    for await (const line of rl) {
      lines++;
      dispatcher.dispatch(line);
      await output?.drained();
      if (!session.isRunning()) {
        logger.info('Session committed', { lines, nodes: session.size });
        return { outcome: 'committed', lines };
      }
    }
  } finally {
    rl.close();
  }

  logger.warn('Input closed before commit', { lines, nodes: session.size });
  return { outcome: 'input-closed', lines };
}
