import type { z } from 'zod';
import { InvalidParamsError } from '../domain/errors/DomainErrors.js';
import { formatIssues } from './wire.js';

/** 已完成參數驗證的 handler，params 為未驗證的原始值 */
export type RegisteredHandler = (params: unknown) => unknown;

export interface OperationDescriptor {
  method: string;
  description: string;
}

interface RegisteredOperation extends OperationDescriptor {
  invoke: RegisteredHandler;
}

/**
 * Operation Registry
 *
 * 設計意圖：啟動時建立的靜態 method → handler 對照表。
 * 每個 operation 以 zod schema 宣告 params，handler 收到的是已驗證且具型別的值；
 * 驗證失敗轉為 InvalidParams。
 */
export class OperationRegistry {
  private readonly table = new Map<string, RegisteredOperation>();

  register<S extends z.ZodTypeAny>(
    method: string,
    description: string,
    params: S,
    handler: (params: z.output<S>) => unknown,
  ): void {
    if (this.table.has(method)) {
      throw new Error(`Operation already registered: ${method}`);
    }
    this.table.set(method, {
      method,
      description,
      invoke: (raw) => {
        const parsed = params.safeParse(raw);
        if (!parsed.success) {
          throw new InvalidParamsError(`Invalid params for ${method}`, formatIssues(parsed.error));
        }
        return handler(parsed.data);
      },
    });
  }

  lookup(method: string): RegisteredHandler | undefined {
    return this.table.get(method)?.invoke;
  }

  list(): OperationDescriptor[] {
    return [...this.table.values()].map(({ method, description }) => ({ method, description }));
  }
}
