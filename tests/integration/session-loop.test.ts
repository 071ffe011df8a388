import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Readable, Writable } from 'node:stream';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { runSession } from '../../src/cli/commands/serve.js';
import { EngineFaultError } from '../../src/domain/errors/DomainErrors.js';
import { KernelEngine } from '../../src/infrastructure/kernel/KernelEngine.js';
import { loadPrelude } from '../../src/infrastructure/kernel/PreludeLoader.js';
import { Dispatcher } from '../../src/protocol/Dispatcher.js';
import { OperationRegistry } from '../../src/protocol/OperationRegistry.js';
import { createProtocolServer } from '../../src/protocol/ProtocolServer.js';
import {
  createStreamWriter,
  ExitCode,
  exitCodeFor,
  runSessionLoop,
} from '../../src/protocol/transports/SessionLoop.js';
import { Logger } from '../../src/shared/Logger.js';

/**
 * Feature: Session loop
 *
 * 作為呼叫端，我逐行送出 request，每行得到一行回應；
 * commit 後 loop 停止讀取，input 結束則以非零結束碼離開。
 */

const quiet = new Logger('Test', 'error', () => {});

function collect(): { stream: Writable; lines: () => string[] } {
  let buffer = '';
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      buffer += chunk.toString('utf-8');
      callback();
    },
  });
  return { stream, lines: () => buffer.split('\n').filter((l) => l.length > 0) };
}

function requestLines(...requests: object[]): string {
  return requests.map((r) => JSON.stringify(r)).join('\n') + '\n';
}

function createServer(output: Writable) {
  return createProtocolServer({
    engine: new KernelEngine(loadPrelude(), quiet),
    writer: createStreamWriter(output),
    budget: { defaultBudget: 1000, maxBudget: 1000 },
    logger: quiet,
  });
}

describe('runSessionLoop', () => {
  /**
   * Scenario F: commit 後停止讀取
   * Given commit 之後還有一行 request
   * When 執行 loop
   * Then 只產生 3 行回應，outcome 為 committed
   */
  it('should stop reading after a successful commit', async () => {
    const out = collect();
    const server = createServer(out.stream);
    const input = Readable.from([requestLines(
      { id: 1, method: 'newState', params: { goals: [{ name: 'g', type: 'True' }] } },
      { id: 2, method: 'applyStep', params: { sid: 1, step: 'exact True.intro' } },
      { id: 3, method: 'commit', params: { sid: 2 } },
      { id: 4, method: 'position' },
    )]);

    const result = await runSessionLoop(input, server.dispatcher, server.session, quiet);

    expect(result).toEqual({ outcome: 'committed', lines: 3 });
    expect(out.lines()).toEqual([
      '{"id":1,"result":1}',
      '{"id":2,"result":2}',
      '{"id":3,"result":null}',
    ]);
    expect(exitCodeFor(result.outcome)).toBe(ExitCode.Committed);
  });

  it('should keep running after a failed commit', async () => {
    const out = collect();
    const server = createServer(out.stream);
    const input = Readable.from([requestLines(
      { id: 1, method: 'commit', params: { sid: 5 } },
      { id: 2, method: 'commit', params: { sid: 0 } },
    )]);

    const result = await runSessionLoop(input, server.dispatcher, server.session, quiet);

    expect(result).toEqual({ outcome: 'committed', lines: 2 });
    expect(out.lines()).toEqual([
      '{"id":1,"error":{"code":-32602,"message":"Invalid node id 5: session has 1 node(s)"}}',
      '{"id":2,"result":null}',
    ]);
  });

  it('should report input-closed when the stream ends before commit', async () => {
    const out = collect();
    const server = createServer(out.stream);
    const input = Readable.from(['{"id":1,"method":"position"}\n\nnot json\n']);

    const result = await runSessionLoop(input, server.dispatcher, server.session, quiet);

    expect(result).toEqual({ outcome: 'input-closed', lines: 3 });
    expect(out.lines()[0]).toBe('{"id":1,"result":null}');
    expect(out.lines()).toHaveLength(3);
    expect(server.session.isRunning()).toBe(true);
    expect(exitCodeFor(result.outcome)).toBe(ExitCode.InputClosed);
  });

  it('should propagate engine faults out of the loop', async () => {
    const registry = new OperationRegistry();
    registry.register('explode', 'Corrupt the engine', z.object({}), () => {
      throw new EngineFaultError('engine state corrupted');
    });
    const out = collect();
    const dispatcher = new Dispatcher(registry, createStreamWriter(out.stream), quiet);
    const input = Readable.from(['{"id":1,"method":"explode"}\n{"id":2,"method":"explode"}\n']);

    await expect(runSessionLoop(input, dispatcher, { size: 1, isRunning: () => true }, quiet))
      .rejects.toThrow(EngineFaultError);
    expect(out.lines()).toEqual([]);
  });
});

describe('createStreamWriter', () => {
  function slowStream() {
    const written: string[] = [];
    const pending: Array<() => void> = [];
    let flowing = false;
    const stream = new Writable({
      highWaterMark: 1,
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk.toString('utf-8'));
        if (flowing) callback();
        else pending.push(() => callback());
      },
    });
    // 完成擱置中的寫入，之後的寫入立即完成
    const release = (): void => {
      flowing = true;
      for (const complete of pending.splice(0)) complete();
    };
    return { stream, written, release };
  }

  function nextTurn(): Promise<void> {
    return new Promise<void>((resolve) => {
      setImmediate(() => resolve());
    });
  }

  it('should resolve drained immediately when the stream accepted the line', async () => {
    const out = collect();
    const writer = createStreamWriter(out.stream);

    writer.writeLine('{"id":1,"result":null}');
    await writer.drained();

    expect(out.lines()).toEqual(['{"id":1,"result":null}']);
  });

  /**
   * Scenario: 輸出端 backpressure
   * Given stream 的 highWaterMark 為 1 且尚未完成寫入
   * When 寫入一行回應
   * Then drained() 直到 stream 送出 'drain' 才完成
   */
  it('should wait for drain after a write that hit the high water mark', async () => {
    const slow = slowStream();
    const writer = createStreamWriter(slow.stream);

    writer.writeLine('{"id":1,"result":0}');
    let settled = false;
    const drained = writer.drained().then(() => {
      settled = true;
    });
    await nextTurn();
    expect(settled).toBe(false);

    slow.release();
    await drained;

    expect(settled).toBe(true);
    expect(slow.written).toEqual(['{"id":1,"result":0}\n']);
  });

  it('should not read the next request while the output is blocked', async () => {
    const slow = slowStream();
    const writer = createStreamWriter(slow.stream);
    const server = createProtocolServer({
      engine: new KernelEngine(loadPrelude(), quiet),
      writer,
      budget: { defaultBudget: 1000, maxBudget: 1000 },
      logger: quiet,
    });
    const input = Readable.from([requestLines(
      { id: 1, method: 'position' },
      { id: 2, method: 'commit', params: { sid: 0 } },
    )]);

    const loop = runSessionLoop(input, server.dispatcher, server.session, quiet, writer);
    await nextTurn();
    await nextTurn();
    expect(slow.written).toEqual(['{"id":1,"result":null}\n']);
    expect(server.session.isRunning()).toBe(true);

    slow.release();

    await expect(loop).resolves.toEqual({ outcome: 'committed', lines: 2 });
    expect(slow.written).toEqual(['{"id":1,"result":null}\n', '{"id":2,"result":null}\n']);
  });
});

describe('runSession', () => {
  const tmpDir = path.join(os.tmpdir(), 'proofline-session-' + Date.now());

  beforeEach(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should run against a custom prelude and exit 0 on commit', async () => {
    const preludePath = path.join(tmpDir, 'prelude.json');
    fs.writeFileSync(preludePath, JSON.stringify({
      declarations: [
        { name: 'P', type: 'Prop' },
        { name: 'hp', type: 'P' },
      ],
      goals: [{ name: 'main', type: 'P' }],
      position: { line: 12, column: 4 },
    }));
    const out = collect();
    const input = Readable.from([requestLines(
      { id: 1, method: 'queryState', params: { sid: 0 } },
      { id: 2, method: 'position' },
      { id: 3, method: 'applyStep', params: { sid: 0, step: 'exact hp' } },
      { id: 4, method: 'commit', params: { sid: 1 } },
    )]);

    const code = await runSession(
      { repoRoot: tmpDir, prelude: preludePath, logLevel: 'error' },
      input,
      out.stream,
    );

    expect(code).toBe(0);
    expect(out.lines()).toEqual([
      '{"id":1,"result":[{"name":"main","hypotheses":[],"target":"P","pretty":"⊢ P"}]}',
      '{"id":2,"result":{"line":12,"column":4}}',
      '{"id":3,"result":1}',
      '{"id":4,"result":null}',
    ]);
  });

  it('should exit 2 when input closes before commit', async () => {
    const out = collect();
    const code = await runSession(
      { repoRoot: tmpDir, logLevel: 'error' },
      Readable.from(['{"id":1,"method":"position"}\n']),
      out.stream,
    );

    expect(code).toBe(2);
    expect(out.lines()).toEqual(['{"id":1,"result":null}']);
  });

  it('should apply the configured default budget', async () => {
    fs.writeFileSync(
      path.join(tmpDir, '.proofline.json'),
      JSON.stringify({ engine: { defaultBudget: 5, maxBudget: 50 } }),
    );
    const out = collect();
    const input = Readable.from([requestLines(
      { id: 1, method: 'applyStep', params: { sid: 0, step: 'repeat skip' } },
    )]);

    const code = await runSession({ repoRoot: tmpDir, logLevel: 'error' }, input, out.stream);

    expect(code).toBe(2);
    expect(out.lines()).toEqual([
      '{"id":1,"error":{"code":1,"message":"maximum step budget of 5 exceeded",'
        + '"data":{"messages":["maximum step budget of 5 exceeded"]}}}',
    ]);
  });

  it('should reject an invalid --budget before reading input', async () => {
    const out = collect();
    await expect(runSession({ repoRoot: tmpDir, budget: 'lots' }, Readable.from([]), out.stream))
      .rejects.toThrow('--budget must be a positive integer, got lots');
  });
});
