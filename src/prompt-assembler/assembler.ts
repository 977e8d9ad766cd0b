/**
 * Prompt Assembler
 *
 * Combines a prompt template, action beats, override variables, the current
 * document and extra reference context into one final prompt. Pure: no I/O,
 * no randomness, identical inputs give identical output.
 */

import { PromptAssemblyError } from '../errors';
import type {
  AdditionalVariables,
  AssembleInput,
  FinalPrompt,
  PromptConfig,
} from './types';

// ============================================================================
// Constants
// ============================================================================

export const ACTION_BEATS_SLOT = 'action_beats';

export const STORY_SO_FAR_HEADING = 'Story so far:';
export const ADDITIONAL_CONTEXT_HEADING = 'Additional context:';

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

// ============================================================================
// Substitution
// ============================================================================

/**
 * Replace `{name}` placeholders in one pass. Unknown placeholders are kept
 * verbatim and substituted values are never re-scanned.
 */
export function substituteVariables(
  template: string,
  variables: Readonly<Record<string, string>>
): string {
  return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : placeholder
  );
}

/**
 * Names of all placeholders present in a template, in order of first use
 */
export function listPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

function hasContent(text: string | null | undefined): text is string {
  return typeof text === 'string' && text.trim().length > 0;
}

// ============================================================================
// Assembly
// ============================================================================

export function assemble(
  promptConfig: PromptConfig,
  actionBeats: string,
  additionalVars: AdditionalVariables,
  currentDocumentText?: string | null,
  extraContext?: string | null
): FinalPrompt {
  const template = promptConfig.template;
  if (!hasContent(template)) {
    throw new PromptAssemblyError('Prompt template is empty', {
      promptTemplateId: promptConfig.promptTemplateId,
    });
  }

  const beats = actionBeats.trim();
  const hasBeatsSlot = listPlaceholders(template).includes(ACTION_BEATS_SLOT);

  const variables: Record<string, string> = { ...additionalVars };
  if (hasBeatsSlot) {
    variables[ACTION_BEATS_SLOT] = beats;
  }

  const sections: string[] = [substituteVariables(template, variables)];

  if (!hasBeatsSlot && beats.length > 0) {
    sections.push(beats);
  }

  if (hasContent(currentDocumentText)) {
    sections.push(`${STORY_SO_FAR_HEADING}\n${currentDocumentText.trim()}`);
  }

  if (hasContent(extraContext)) {
    sections.push(`${ADDITIONAL_CONTEXT_HEADING}\n${extraContext.trim()}`);
  }

  return sections.join('\n\n');
}

/**
 * Object-argument form of {@link assemble}
 */
export function assemblePrompt(input: AssembleInput): FinalPrompt {
  return assemble(
    input.promptConfig,
    input.actionBeats,
    input.additionalVars,
    input.currentDocumentText,
    input.extraContext
  );
}
