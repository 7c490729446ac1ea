/**
 * Action schema — what a policy sends each step.
 *
 * Validated once at the protocol boundary; past `parseAction` the rest of
 * the adapter only sees a typed `Action`.
 */

import { z } from 'zod';
import { InvalidActionError } from '../errors';

export const ActionSchema = z.object({
  direction_radians: z.number().finite().describe('Heading to move in, radians; 0 = +x'),
});

export type Action = z.infer<typeof ActionSchema>;

export function parseAction(raw: unknown): Action {
  const result = ActionSchema.safeParse(raw);

  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'action'}: ${issue.message}`)
      .join('; ');
    throw new InvalidActionError(`Invalid action (expected { direction_radians: number }): ${detail}`);
  }

  return result.data;
}
