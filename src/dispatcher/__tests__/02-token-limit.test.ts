/**
 * Prompt Dispatcher - token limit recovery end to end
 */

import { PromptDispatcher } from '../PromptDispatcher';
import type { DispatchErrorEvent, DispatchRequest } from '../types';
import { RecoveryError, RecoveryExhaustedError } from '../../errors';
import type { TokenLimitEvent, WorkerOutcome } from '../../generation-worker/types';
import type { RecoveryEvent, TailTokenizer } from '../../token-limit-recovery/types';
import {
  ManualSummarizer,
  ScriptedAggregator,
  createTestLogger,
  flushMicrotasks,
  overflows,
  streams,
} from '../../__tests__/fakes';

// ============================================================================
// Helpers
// ============================================================================

const document = 'Mara crossed the bridge at dusk.';

function request(overrides: Partial<DispatchRequest> = {}): DispatchRequest {
  return {
    actionBeats: 'He opens the door.',
    promptConfig: {
      promptTemplateId: 'scene',
      template: '{action_beats}',
      providerOverrides: { model: 'test-model', maxTokens: 2000 },
    },
    currentDocumentText: document,
    extraContext: 'It is raining.',
    ...overrides,
  };
}

function observe(dispatcher: PromptDispatcher) {
  const recovery: RecoveryEvent[] = [];
  const overflowsSeen: TokenLimitEvent[] = [];
  const finished: WorkerOutcome[] = [];
  const errors: DispatchErrorEvent[] = [];
  dispatcher.on('recovery', event => recovery.push(event));
  dispatcher.on('tokenLimitExceeded', event => overflowsSeen.push(event));
  dispatcher.on('finished', outcome => finished.push(outcome));
  dispatcher.on('error', event => errors.push(event));
  return { recovery, overflows: overflowsSeen, finished, errors };
}

function retryTaskIds(events: RecoveryEvent[]): string[] {
  return events.flatMap(event => (event.type === 'retrying' ? [event.taskId] : []));
}

function completedTask(dispatcher: PromptDispatcher): Promise<WorkerOutcome> {
  return new Promise(resolve => {
    const unsubscribe = dispatcher.on('finished', outcome => {
      if (outcome.state === 'completed') {
        unsubscribe();
        resolve(outcome);
      }
    });
  });
}

// ============================================================================
// Automatic Recovery
// ============================================================================

describe('PromptDispatcher token limit recovery', () => {
  describe('with a summarizer', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should retry with a summary that arrives within the timeout', async () => {
      const aggregator = new ScriptedAggregator(overflows(), streams('The hinge ', 'groans.'));
      const summarizer = new ManualSummarizer();
      const dispatcher = new PromptDispatcher({ aggregator, summarizer, logger: createTestLogger() });
      const seen = observe(dispatcher);

      const task = dispatcher.dispatch(request());
      await flushMicrotasks();

      expect(seen.overflows.map(event => event.taskId)).toEqual([task.id]);
      expect(dispatcher.recoveryState).toBe('summarizing');
      expect(summarizer.requests.map(entry => entry.text)).toEqual([document]);

      jest.advanceTimersByTime(10000);
      summarizer.resolve('Door creaks open.');
      await flushMicrotasks(50);

      const [retryId] = retryTaskIds(seen.recovery);
      expect(seen.recovery.map(event => event.type)).toEqual(['summarizing', 'retrying']);
      expect(aggregator.calls[1].prompt).toBe('He opens the door.\n\nStory so far:\nDoor creaks open.');
      expect(seen.finished.map(outcome => `${outcome.taskId}:${outcome.state}`)).toEqual([
        `${task.id}:failed`,
        `${retryId}:completed`,
      ]);
      expect(seen.finished[1].text).toBe('The hinge groans.');
      expect(dispatcher.activeTask?.id).toBe(retryId);
      expect(dispatcher.recoveryState).toBe('resolved');
      expect(seen.errors).toEqual([]);
    });

    it('should hand the partial summary to the user when the timer fires first', async () => {
      const aggregator = new ScriptedAggregator(overflows(), streams('ok'));
      const summarizer = new ManualSummarizer();
      const dispatcher = new PromptDispatcher(
        { aggregator, summarizer, logger: createTestLogger() },
        { recovery: { summaryTimeoutMs: 30000 } }
      );
      const seen = observe(dispatcher);

      const task = dispatcher.dispatch(request());
      await flushMicrotasks();
      summarizer.partial('Mara cross');
      jest.advanceTimersByTime(30000);

      expect(seen.recovery[1]).toEqual({
        type: 'summaryForReview',
        originTaskId: task.id,
        text: 'Mara cross',
        source: 'partial_summary',
      });
      expect(summarizer.requests[0].options.signal.aborted).toBe(true);
      expect(dispatcher.recoveryState).toBe('awaiting_user');

      const retry = dispatcher.retryWithSummary('Mara crossed at dusk.');

      expect(retry.prompt).toBe('He opens the door.\n\nStory so far:\nMara crossed at dusk.');
      expect(dispatcher.activeTask?.id).toBe(retry.id);
      expect(retryTaskIds(seen.recovery)).toEqual([retry.id]);
    });

    it('should drop the flow when the user dispatches again', async () => {
      const aggregator = new ScriptedAggregator(overflows(), streams('fresh'));
      const summarizer = new ManualSummarizer();
      const dispatcher = new PromptDispatcher({ aggregator, summarizer, logger: createTestLogger() });
      const seen = observe(dispatcher);

      dispatcher.dispatch(request());
      await flushMicrotasks();
      const next = dispatcher.dispatch(request({ actionBeats: 'She waits.', currentDocumentText: null }));
      summarizer.resolve('Too late.');
      await flushMicrotasks(50);

      expect(summarizer.requests[0].options.signal.aborted).toBe(true);
      expect(retryTaskIds(seen.recovery)).toEqual([]);
      expect(aggregator.calls).toHaveLength(2);
      expect(dispatcher.activeTask?.id).toBe(next.id);
      expect(dispatcher.recoveryState).toBe('idle');
    });
  });

  it('should retry once with the cached summary', async () => {
    const aggregator = new ScriptedAggregator(overflows(), streams('Done.'));
    const summarizer = new ManualSummarizer();
    const dispatcher = new PromptDispatcher({ aggregator, summarizer, logger: createTestLogger() });
    const seen = observe(dispatcher);

    dispatcher.dispatch(request({ cachedSummary: 'Saved synopsis.' }));
    const outcome = await completedTask(dispatcher);

    expect(aggregator.calls[1].prompt).toBe('He opens the door.\n\nStory so far:\nSaved synopsis.');
    expect(summarizer.requests).toHaveLength(0);
    expect(seen.recovery).toEqual([
      expect.objectContaining({ type: 'retrying', strategy: 'cached_summary', taskId: outcome.taskId }),
    ]);
    expect(dispatcher.recoveryState).toBe('resolved');
  });

  it('should summarize through the aggregator by default', async () => {
    const aggregator = new ScriptedAggregator(overflows(), streams('Short ', 'synopsis.'), streams('Retry text.'));
    const dispatcher = new PromptDispatcher({ aggregator, logger: createTestLogger() });

    dispatcher.dispatch(request());
    const outcome = await completedTask(dispatcher);

    expect(aggregator.calls).toHaveLength(3);
    expect(aggregator.calls[1].prompt).toContain(document);
    expect(aggregator.calls[2].prompt).toBe('He opens the door.\n\nStory so far:\nShort synopsis.');
    expect(outcome.text).toBe('Retry text.');
  });

  // ============================================================================
  // Manual Recovery
  // ============================================================================

  describe('without a summarizer', () => {
    function createTokenizer() {
      const tail = jest.fn((_text: string, _maxTokens: number) => ({
        text: 'at dusk.',
        tokenCount: 3,
        totalTokens: 8,
        truncated: true,
      }));
      const tokenizer: TailTokenizer = { tail };
      return { tokenizer, tail };
    }

    it('should ask for manual intervention', async () => {
      const aggregator = new ScriptedAggregator(overflows('context_length_exceeded', 'The '));
      const dispatcher = new PromptDispatcher({ aggregator, summarizer: null, logger: createTestLogger() });
      const seen = observe(dispatcher);

      const task = dispatcher.dispatch(request());
      await flushMicrotasks();

      expect(seen.recovery).toEqual([
        {
          type: 'manualInterventionRequired',
          originTaskId: task.id,
          rawMessage: 'context_length_exceeded',
          partialOutput: 'The ',
          maxTokens: 2000,
        },
      ]);
      expect(seen.overflows[0].partialOutput).toBe('The ');
      expect(dispatcher.recoveryState).toBe('awaiting_user');
    });

    it('should report exhaustion when the truncated retry overflows', async () => {
      const aggregator = new ScriptedAggregator(overflows());
      const { tokenizer, tail } = createTokenizer();
      const dispatcher = new PromptDispatcher({ aggregator, summarizer: null, tokenizer, logger: createTestLogger() });
      const seen = observe(dispatcher);

      const task = dispatcher.dispatch(request());
      await flushMicrotasks();
      const retry = dispatcher.retryWithTruncatedContext();
      await flushMicrotasks();

      expect(tail).toHaveBeenCalledWith(document, 1000);
      expect(retry.prompt).toBe('He opens the door.\n\nStory so far:\nat dusk.');
      expect(seen.recovery.map(event => event.type)).toEqual([
        'manualInterventionRequired',
        'retrying',
        'exhausted',
      ]);
      const exhausted = seen.recovery[2];
      expect(exhausted.originTaskId).toBe(task.id);
      expect(exhausted.type === 'exhausted' && exhausted.error).toBeInstanceOf(RecoveryExhaustedError);
      expect(seen.overflows.map(event => event.taskId)).toEqual([task.id, retry.id]);
      expect(seen.errors).toEqual([]);
      expect(dispatcher.recoveryState).toBe('exhausted');
    });

    it('should require manual intervention again when a summary retry overflows', async () => {
      const aggregator = new ScriptedAggregator(overflows());
      const dispatcher = new PromptDispatcher({ aggregator, summarizer: null, logger: createTestLogger() });
      const seen = observe(dispatcher);

      dispatcher.dispatch(request());
      await flushMicrotasks();
      dispatcher.retryWithSummary('Still far too long.');
      await flushMicrotasks();

      expect(seen.recovery.map(event => event.type)).toEqual([
        'manualInterventionRequired',
        'retrying',
        'manualInterventionRequired',
      ]);
      expect(seen.errors).toEqual([]);
    });

    it('should refuse manual retries with nothing to recover', () => {
      const dispatcher = new PromptDispatcher({
        aggregator: new ScriptedAggregator(streams('ok')),
        summarizer: null,
        logger: createTestLogger(),
      });

      expect(() => dispatcher.retryWithSummary('A summary.')).toThrow(RecoveryError);
      expect(() => dispatcher.retryWithTruncatedContext()).toThrow(RecoveryError);
    });
  });
});
