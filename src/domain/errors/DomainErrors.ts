/**
 * Session 錯誤分類
 *
 * - transport：無法解出 Request，回應不帶 id
 * - request：Request 層級錯誤（method、params），回應帶原 id
 * - engine：引擎回報的失敗（語法、執行、elaboration），回應帶原 id
 * - internal：handler 內非預期例外
 */
export type ErrorClassification = 'transport' | 'request' | 'engine' | 'internal';

/** 線上錯誤格式 */
export interface WireError {
  code: number;
  message: string;
  data?: unknown;
}

/** 所有可轉換為協定回應的錯誤的基底類別 */
export abstract class SessionError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: number;
  abstract readonly kind: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }

  /** 額外資料，僅在有內容時輸出 */
  get data(): unknown {
    return undefined;
  }

  toWire(): WireError {
    const data = this.data;
    return data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data };
  }
}

// --- Transport ---

export class TransportParseError extends SessionError {
  readonly classification = 'transport' as const;
  readonly code = -32700;
  readonly kind = 'TransportParseError' as const;
}

export class InvalidRequestError extends SessionError {
  readonly classification = 'transport' as const;
  readonly code = -32600;
  readonly kind = 'InvalidRequest' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  override get data(): unknown {
    return this.issues.length > 0 ? { issues: [...this.issues] } : undefined;
  }
}

// --- Request ---

export class MethodNotFoundError extends SessionError {
  readonly classification = 'request' as const;
  readonly code = -32601;
  readonly kind = 'MethodNotFound' as const;

  constructor(public readonly method: string, options?: ErrorOptions) {
    super(`Method not found: ${method}`, options);
  }
}

export class InvalidParamsError extends SessionError {
  readonly classification = 'request' as const;
  readonly code = -32602;
  readonly kind = 'InvalidParams' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  override get data(): unknown {
    return this.issues.length > 0 ? { issues: [...this.issues] } : undefined;
  }
}

// --- Engine ---

export class StepParseError extends SessionError {
  readonly classification = 'engine' as const;
  readonly code = 0;
  readonly kind = 'StepParseError' as const;
}

export class StepExecutionError extends SessionError {
  readonly classification = 'engine' as const;
  readonly code = 1;
  readonly kind = 'StepExecutionError' as const;

  constructor(
    public readonly messages: readonly string[],
    options?: ErrorOptions,
  ) {
    super(messages.length > 0 ? messages.join('\n') : 'step failed', options);
  }

  override get data(): unknown {
    return { messages: [...this.messages] };
  }
}

export class ExpressionParseError extends SessionError {
  readonly classification = 'engine' as const;
  readonly code = 2;
  readonly kind = 'ExpressionParseError' as const;
}

export class ElaborationError extends SessionError {
  readonly classification = 'engine' as const;
  readonly code = 3;
  readonly kind = 'ElaborationError' as const;
}

// --- Internal ---

export class InternalError extends SessionError {
  readonly classification = 'internal' as const;
  readonly code = -32603;
  readonly kind = 'InternalError' as const;
}

export type SessionFailure =
  | TransportParseError
  | InvalidRequestError
  | MethodNotFoundError
  | InvalidParamsError
  | StepParseError
  | StepExecutionError
  | ExpressionParseError
  | ElaborationError
  | InternalError;

/**
 * 引擎內部狀態毀損
 *
 * 不屬於 SessionError：dispatcher 不轉成回應，而是往上拋出並結束 session loop。
 */
export class EngineFaultError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EngineFaultError';
  }
}
