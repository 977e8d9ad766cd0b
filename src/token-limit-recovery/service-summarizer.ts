/**
 * Service Summarizer
 *
 * Summarizes the story so far by sending a synopsis prompt through the
 * service aggregator. Partial text is reported while it streams so a timed
 * out summary still leaves something to review.
 */

import { substituteVariables } from '../prompt-assembler/assembler';
import type { PromptConfig, ProviderOverrides } from '../prompt-assembler/types';
import type { ServiceAggregator } from '../service-aggregator/types';
import type { SummarizeOptions, Summarizer } from './types';

export const SYNOPSIS_TEMPLATE_ID = 'synopsis';

export const DEFAULT_SYNOPSIS_TEMPLATE =
  'Summarize the story below as a concise synopsis. Keep every named character, ' +
  'the current location and any unresolved plot threads. Reply with the synopsis only.\n\n{document}';

export const DEFAULT_SYNOPSIS_MAX_TOKENS = 500;

export interface ServiceSummarizerOptions {
  /** Must contain a `{document}` placeholder */
  template?: string;
  systemInstructions?: string;
  maxTokens?: number;
  /** Applied over the recovered task's provider settings */
  providerOverrides?: ProviderOverrides;
}

export class ServiceSummarizer implements Summarizer {
  private readonly aggregator: ServiceAggregator;
  private readonly template: string;
  private readonly systemInstructions?: string;
  private readonly maxTokens: number;
  private readonly overrides: ProviderOverrides;

  constructor(aggregator: ServiceAggregator, options: ServiceSummarizerOptions = {}) {
    this.aggregator = aggregator;
    this.template = options.template ?? DEFAULT_SYNOPSIS_TEMPLATE;
    this.systemInstructions = options.systemInstructions;
    this.maxTokens = options.maxTokens ?? DEFAULT_SYNOPSIS_MAX_TOKENS;
    this.overrides = options.providerOverrides ?? {};
  }

  async summarize(text: string, options: SummarizeOptions): Promise<string> {
    const prompt = substituteVariables(this.template, { document: text.trim() });
    const config: PromptConfig = {
      promptTemplateId: SYNOPSIS_TEMPLATE_ID,
      template: this.template,
      providerOverrides: {
        ...options.providerOverrides,
        maxTokens: this.maxTokens,
        ...this.overrides,
      },
      systemInstructions: this.systemInstructions,
    };

    let summary = '';
    for await (const chunk of this.aggregator.generate(prompt, config, { signal: options.signal })) {
      summary += chunk;
      options.onPartial?.(summary);
    }

    return summary.trim();
  }
}
