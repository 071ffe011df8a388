import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { SidParamsSchema } from './schemas.js';

/**
 * Operation: queryState
 * 回傳節點 sid 的開放目標（pretty-printed）。
 */
export function registerQueryStateOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'queryState',
    'List the open goals at node sid',
    SidParamsSchema,
    ({ sid }) => operations.queryState(sid),
  );
}
