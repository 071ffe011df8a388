import { z } from 'zod';
import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { NodeIdSchema } from './schemas.js';

/**
 * Operation: applyStep
 * 在節點 sid 上執行一個步驟，成功時回傳新節點 id。
 */
export function registerApplyStepOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'applyStep',
    'Run a step against node sid under a step budget; returns the new node id',
    z.object({
      sid: NodeIdSchema,
      step: z.string().describe('Step text'),
      budget: z.number().int().positive().optional()
        .describe('Maximum engine steps; defaults to the configured budget'),
    }),
    ({ sid, step, budget }) => operations.applyStep(sid, step, budget),
  );
}
