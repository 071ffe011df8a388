import { z } from 'zod';
import type { SessionOperations } from '../../application/SessionOperations.js';
import type { OperationRegistry } from '../OperationRegistry.js';

/** Operation: position */
export function registerPositionOperation(
  registry: OperationRegistry,
  operations: SessionOperations,
): void {
  registry.register(
    'position',
    'Source position of the ambient context, or null',
    z.object({}),
    () => operations.position(),
  );
}
