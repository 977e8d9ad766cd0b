/**
 * Service Summarizer Tests
 */

import { ServiceSummarizer, SYNOPSIS_TEMPLATE_ID } from '../service-summarizer';
import { ScriptedAggregator, streams } from '../../__tests__/fakes';

describe('ServiceSummarizer', () => {
  it('should send the document through a synopsis prompt', async () => {
    const aggregator = new ScriptedAggregator(streams('Mara ', 'flees.'));
    const summarizer = new ServiceSummarizer(aggregator, { template: 'Summarize:\n{document}', maxTokens: 300 });

    const summary = await summarizer.summarize('  Mara ran.  ', {
      signal: new AbortController().signal,
      providerOverrides: { provider: 'ollama', model: 'llama3.1', maxTokens: 4000 },
    });

    expect(summary).toBe('Mara flees.');
    expect(aggregator.calls[0].prompt).toBe('Summarize:\nMara ran.');
    expect(aggregator.calls[0].config).toEqual({
      promptTemplateId: SYNOPSIS_TEMPLATE_ID,
      template: 'Summarize:\n{document}',
      providerOverrides: { provider: 'ollama', model: 'llama3.1', maxTokens: 300 },
      systemInstructions: undefined,
    });
  });

  it('should report partial text as it streams', async () => {
    const summarizer = new ServiceSummarizer(new ScriptedAggregator(streams('One ', 'two ', 'three.')));
    const partials: string[] = [];

    await summarizer.summarize('text', { signal: new AbortController().signal, onPartial: text => partials.push(text) });

    expect(partials).toEqual(['One ', 'One two ', 'One two three.']);
  });

  it('should let its own overrides win', async () => {
    const aggregator = new ScriptedAggregator(streams('ok'));
    const summarizer = new ServiceSummarizer(aggregator, { providerOverrides: { model: 'small-model' } });

    await summarizer.summarize('text', {
      signal: new AbortController().signal,
      providerOverrides: { model: 'big-model' },
    });

    expect(aggregator.calls[0].config.providerOverrides).toEqual({ model: 'small-model', maxTokens: 500 });
  });
});
