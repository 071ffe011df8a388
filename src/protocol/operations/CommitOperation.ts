import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { SidParamsSchema } from './schemas.js';

/**
 * Operation: commit
 * 結束 session；回應送出後 loop 不再讀取下一行。
 */
export function registerCommitOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'commit',
    'Finish the session at node sid',
    SidParamsSchema,
    ({ sid }) => {
      operations.commit(sid);
      return null;
    },
  );
}
