import { z } from 'zod';
import type { WireError } from '../domain/errors/DomainErrors.js';

/**
 * 線上格式
 *
 * 每行一個 compact JSON 物件。Request 的 params 可省略（視為 {}），
 * 其他頂層欄位（如 "jsonrpc"）忽略。
 */
export const RequestSchema = z.object({
  id: z.unknown().optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional().default({}),
});

export type WireRequest = z.output<typeof RequestSchema>;

export const WireErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const ResponseSchema = z.object({
  id: z.unknown().optional(),
  result: z.unknown().optional(),
  error: WireErrorSchema.optional(),
});

export interface WireResponse {
  id?: unknown;
  result?: unknown;
  error?: WireError;
}

/** zod issue 轉為 `path: message` 文字 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/** 依欄位順序 id → result/error 輸出，未出現的欄位省略 */
export function encodeResponse(response: WireResponse): string {
  const ordered: Record<string, unknown> = {};
  if ('id' in response) ordered.id = response.id;
  if (response.error !== undefined) {
    ordered.error = response.error;
  } else if ('result' in response) {
    ordered.result = response.result;
  }
  return JSON.stringify(ordered);
}

/** 解碼回應行（client 與測試使用） */
export function decodeResponse(line: string): WireResponse {
  const parsed = ResponseSchema.parse(JSON.parse(line));
  const response: WireResponse = {};
  if ('id' in parsed) response.id = parsed.id;
  if ('result' in parsed) response.result = parsed.result;
  if (parsed.error) response.error = parsed.error;
  return response;
}
