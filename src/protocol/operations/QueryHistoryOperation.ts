import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { SidParamsSchema } from './schemas.js';

/**
 * Operation: queryHistory
 * 回傳從 root 到 sid 的節點路徑，可用來重放某個分支。
 */
export function registerQueryHistoryOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'queryHistory',
    'Path of nodes from the root to node sid',
    SidParamsSchema,
    ({ sid }) => operations.queryHistory(sid),
  );
}
