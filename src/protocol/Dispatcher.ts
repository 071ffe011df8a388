import {
  EngineFaultError,
  InternalError,
  InvalidRequestError,
  MethodNotFoundError,
  SessionError,
  TransportParseError,
} from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';
import type { OperationRegistry } from './OperationRegistry.js';
import { encodeResponse, formatIssues, RequestSchema, type WireResponse } from './wire.js';

/** 回應輸出端：每次寫入一行並立即送出 */
export interface LineWriter {
  writeLine(line: string): void;
}

/**
 * Protocol Dispatcher
 *
 * 每一行輸入恰好產生一行回應（半雙工、無 pipelining）：
 * 1. JSON 解析失敗 → ParseError，不帶 id
 * 2. 不符 Request schema → InvalidRequest，不帶 id
 * 3. 合法 Request → registry lookup 並呼叫 handler，成功或失敗皆帶原 id
 *
 * EngineFaultError 不轉成回應，直接往上拋出。
 */
export class Dispatcher {
  constructor(
    private readonly registry: OperationRegistry,
    private readonly writer: LineWriter,
    private readonly logger: Logger = new Logger('Dispatcher'),
  ) {}

  dispatch(line: string): WireResponse {
    const response = this.handle(line);
    this.writer.writeLine(encodeResponse(response));
    return response;
  }

  handle(line: string): WireResponse {
    let payload: unknown;
    try {
      payload = JSON.parse(line);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.warn('Malformed request line', { error: detail });
      return { error: new TransportParseError(`Parse error: ${detail}`).toWire() };
    }

    const request = RequestSchema.safeParse(payload);
    if (!request.success) {
      const issues = formatIssues(request.error);
      this.logger.warn('Invalid request', { issues });
      return { error: new InvalidRequestError('Invalid request', issues).toWire() };
    }

    const { id, method, params } = request.data;
    const started = Date.now();
    try {
      const handler = this.registry.lookup(method);
      if (!handler) throw new MethodNotFoundError(method);
      const result = handler(params);
      this.logger.debug('Request handled', { method, durationMs: Date.now() - started });
      return { id, result: result === undefined ? null : result };
    } catch (err) {
      if (err instanceof EngineFaultError) {
        this.logger.error('Engine fault', { method, error: err.message });
        throw err;
      }
      const failure = err instanceof SessionError
        ? err
        : new InternalError(err instanceof Error ? err.message : String(err), { cause: err });
      this.logger.warn('Request failed', {
        method,
        kind: failure.kind,
        error: failure.message,
        durationMs: Date.now() - started,
      });
      return { id, error: failure.toWire() };
    }
  }
}
