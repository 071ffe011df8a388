import { z } from 'zod';
import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { NodeIdSchema } from './schemas.js';

/**
 * Operation: resolveName
 * 回傳 (宣告名稱, 剩餘欄位) 候選清單，不修改證明樹。
 */
export function registerResolveNameOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'resolveName',
    'Resolve a possibly dotted global name at node sid',
    z.object({
      sid: NodeIdSchema,
      name: z.string().min(1).describe('Name to resolve'),
    }),
    ({ sid, name }) => operations.resolveName(sid, name),
  );
}
