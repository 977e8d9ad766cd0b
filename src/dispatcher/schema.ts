/**
 * Dispatch Request Validation
 */

import { z } from 'zod';
import { DispatchValidationError } from '../errors';
import { additionalVariablesSchema, promptConfigSchema } from '../prompt-assembler/schema';

export const dispatchRequestSchema = z.object({
  actionBeats: z.string().refine(value => value.trim().length > 0, 'actionBeats must not be empty'),
  promptConfig: promptConfigSchema,
  additionalVars: additionalVariablesSchema.default({}),
  currentDocumentText: z.string().nullish(),
  extraContext: z.string().nullish(),
  cachedSummary: z.string().nullish(),
});

export type ParsedDispatchRequest = z.output<typeof dispatchRequestSchema>;

export function parseDispatchRequest(request: unknown): ParsedDispatchRequest {
  const result = dispatchRequestSchema.safeParse(request);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(request)',
    message: issue.message,
  }));
  const summary = issues.map(issue => `${issue.field}: ${issue.message}`).join('; ');
  throw new DispatchValidationError(`Invalid dispatch request: ${summary}`, issues);
}
