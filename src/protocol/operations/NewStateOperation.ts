import { z } from 'zod';
import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';

/**
 * Operation: newState
 * 以使用者提供的目標建立新 context，作為 root 的子節點。
 */
export function registerNewStateOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'newState',
    'Create a fresh proof state from named, typed goals',
    z.object({
      goals: z.array(z.object({
        name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_'.]*$/, 'goal name must be an identifier'),
        type: z.string().min(1),
      })).describe('Goals of the new state'),
    }),
    ({ goals }) => operations.newState(goals),
  );
}
