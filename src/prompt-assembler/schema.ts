/**
 * Prompt Config Schema
 */

import { z } from 'zod';

export const providerOverridesSchema = z.record(z.union([z.string(), z.number()]));

export const promptConfigSchema = z.object({
  promptTemplateId: z.string().min(1, 'promptTemplateId is required'),
  template: z.string().refine(value => value.trim().length > 0, 'template must not be empty'),
  providerOverrides: providerOverridesSchema.default({}),
  systemInstructions: z.string().optional(),
});

export const additionalVariablesSchema = z.record(z.string());

export type PromptConfigInput = z.input<typeof promptConfigSchema>;
