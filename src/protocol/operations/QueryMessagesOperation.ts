import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { SidParamsSchema } from './schemas.js';

/** Operation: queryMessages */
export function registerQueryMessagesOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'queryMessages',
    'List the diagnostics accumulated at node sid',
    SidParamsSchema,
    ({ sid }) => operations.queryMessages(sid),
  );
}
