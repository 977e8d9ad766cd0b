/**
 * Prompt Assembler - Public API
 */

export {
  assemble,
  assemblePrompt,
  substituteVariables,
  listPlaceholders,
  ACTION_BEATS_SLOT,
  STORY_SO_FAR_HEADING,
  ADDITIONAL_CONTEXT_HEADING,
} from './assembler';

export { resolveMaxTokens, readNumber, readString, MAX_TOKENS_KEYS } from './overrides';

export {
  promptConfigSchema,
  providerOverridesSchema,
  additionalVariablesSchema,
} from './schema';
export type { PromptConfigInput } from './schema';

export type {
  PromptConfig,
  ProviderOverrides,
  AdditionalVariables,
  FinalPrompt,
  AssembleInput,
} from './types';
