import { z } from 'zod';

/**
 * Zod schema for one unit of work handed to the orchestrator.
 *
 * - `entity_id` identifies the tracked entity; inputs for an entity with
 *   a live workflow are merged into it.
 * - `payload` is open-ended and passed through to the collaborators.
 * - `received_at` is optional; producers stamp it when they know it.
 */
export const inputSchema = z.object({
  entity_id: z.string().min(1).max(255),
  payload: z.record(z.string(), z.unknown()).default({}),
  received_at: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }).optional(),
});

export type WorkflowInput = z.infer<typeof inputSchema>;

export const inputBatchSchema = z
  .array(inputSchema)
  .min(1, 'Batch must contain at least one input')
  .max(1000, 'Batch must contain at most 1000 inputs');

/** Human-readable issue list, `path: message`. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}
