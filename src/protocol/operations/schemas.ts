import { z } from 'zod';

export const NodeIdSchema = z.number().int().nonnegative().describe('Proof tree node id');

export const SidParamsSchema = z.object({ sid: NodeIdSchema });
