import { z } from 'zod';
import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';
import { NodeIdSchema } from './schemas.js';

/**
 * Operation: unify
 * 無 unifier 時結果為 null；否則為 metavariable → 解（未指派為 null）。
 */
export function registerUnifyOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'unify',
    'Unify two expressions in the context of node sid',
    z.object({
      sid: NodeIdSchema,
      lhs: z.string().describe('Left expression; ?m marks a metavariable'),
      rhs: z.string().describe('Right expression'),
    }),
    ({ sid, lhs, rhs }) => operations.unify(sid, lhs, rhs),
  );
}
