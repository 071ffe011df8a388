import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { SidParamsSchema } from './schemas.js';

/** Operation: giveUp：以 sorry 關閉所有開放目標 */
export function registerGiveUpOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'giveUp',
    'Admit every open goal at node sid; returns the new node id',
    SidParamsSchema,
    ({ sid }) => operations.giveUp(sid),
  );
}
