/**
 * Prompt Assembler Types
 */

// ============================================================================
// Prompt Configuration
// ============================================================================

/**
 * Provider overrides attached to a prompt template
 * (e.g. provider, model, temperature, maxTokens).
 */
export type ProviderOverrides = Readonly<Record<string, string | number>>;

export interface PromptConfig {
  promptTemplateId: string;
  template: string;
  providerOverrides: ProviderOverrides;
  systemInstructions?: string;
}

/**
 * Variables substituted into the template (pov, pov_character, tense, ...)
 */
export type AdditionalVariables = Readonly<Record<string, string>>;

// ============================================================================
// Final Prompt
// ============================================================================

/**
 * The assembled prompt text sent to the generation service.
 */
export type FinalPrompt = string;

export interface AssembleInput {
  promptConfig: PromptConfig;
  actionBeats: string;
  additionalVars: AdditionalVariables;
  currentDocumentText?: string | null;
  extraContext?: string | null;
}
