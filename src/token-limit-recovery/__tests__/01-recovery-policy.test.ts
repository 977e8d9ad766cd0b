/**
 * Token Limit Recovery - retry policy
 */

import { TokenLimitRecovery } from '../TokenLimitRecovery';
import type { RecoverableRequest, RecoveryEvent, RecoveryHost, RetryPlan } from '../types';
import { RecoveryError, RecoveryExhaustedError, TokenLimitError } from '../../errors';
import { isValidTaskId } from '../../generation-worker/task-id-generator';
import { TokenEstimator } from '../../token-estimator';
import { ManualSummarizer, createTestLogger, flushMicrotasks } from '../../__tests__/fakes';

// ============================================================================
// Helpers
// ============================================================================

const document = 'Mara crossed the bridge at dusk.\nThe river below was loud.';

function request(overrides: Partial<RecoverableRequest> = {}): RecoverableRequest {
  return {
    promptConfig: {
      promptTemplateId: 'scene',
      template: '{action_beats}',
      providerOverrides: { model: 'test-model', maxTokens: 2000 },
    },
    actionBeats: 'He opens the door.',
    additionalVars: {},
    currentDocumentText: document,
    ...overrides,
  };
}

function overflow(taskId: string, req: RecoverableRequest = request(), partialOutput = '') {
  return {
    taskId,
    request: req,
    error: new TokenLimitError("This model's maximum context length is 8192 tokens.", 'prompt', req.promptConfig),
    partialOutput,
  };
}

function createHost() {
  const events: RecoveryEvent[] = [];
  const plans: RetryPlan[] = [];
  const host: RecoveryHost = {
    dispatchRetry: plan => {
      plans.push(plan);
    },
    notify: event => {
      events.push(event);
    },
  };
  return { host, events, plans };
}

function types(events: RecoveryEvent[]): string[] {
  return events.map(event => event.type);
}

// ============================================================================
// Tests
// ============================================================================

describe('TokenLimitRecovery', () => {
  let estimator: TokenEstimator;

  beforeAll(() => {
    estimator = new TokenEstimator();
  });

  afterAll(() => {
    estimator.dispose();
  });

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  function setup(withSummarizer = true) {
    const { host, events, plans } = createHost();
    const summarizer = new ManualSummarizer();
    const recovery = new TokenLimitRecovery({
      host,
      tokenizer: estimator,
      summarizer: withSummarizer ? summarizer : undefined,
      logger: createTestLogger(),
    });
    return { recovery, summarizer, events, plans };
  }

  describe('cached summary', () => {
    it('should retry once with the cached summary', () => {
      const { recovery, summarizer, events, plans } = setup();

      recovery.handle(overflow('task_1_origin', request({ cachedSummary: '  Mara fled north.  ' })));

      expect(plans).toHaveLength(1);
      expect(plans[0]).toMatchObject({
        originTaskId: 'task_1_origin',
        strategy: 'cached_summary',
        documentText: 'Mara fled north.',
      });
      expect(isValidTaskId(plans[0].taskId)).toBe(true);
      expect(recovery.retryTaskId).toBe(plans[0].taskId);
      expect(recovery.state).toBe('retrying');
      expect(events).toEqual([
        { type: 'retrying', originTaskId: 'task_1_origin', strategy: 'cached_summary', taskId: plans[0].taskId },
      ]);
      expect(summarizer.requests).toHaveLength(0);
    });

    it('should go manual when the cached retry overflows again', () => {
      const { recovery, events, plans } = setup();
      recovery.handle(overflow('task_1_origin', request({ cachedSummary: 'Mara fled north.' })));

      recovery.handle(overflow(plans[0].taskId, request(), 'Half a sent'));

      expect(plans).toHaveLength(1);
      expect(recovery.state).toBe('awaiting_user');
      expect(events[1]).toEqual({
        type: 'manualInterventionRequired',
        originTaskId: 'task_1_origin',
        rawMessage: "This model's maximum context length is 8192 tokens.",
        partialOutput: 'Half a sent',
        maxTokens: 2000,
      });
    });
  });

  describe('automatic summary', () => {
    it('should re-dispatch when the summary arrives within the timeout', async () => {
      const { recovery, summarizer, events, plans } = setup();

      recovery.handle(overflow('task_1_origin'));

      expect(events).toEqual([{ type: 'summarizing', originTaskId: 'task_1_origin', timeoutMs: 30000 }]);
      expect(summarizer.requests[0].text).toBe(document);
      expect(summarizer.requests[0].options.providerOverrides).toEqual({ model: 'test-model', maxTokens: 2000 });

      jest.advanceTimersByTime(10000);
      summarizer.resolve('Door creaks open.');
      await flushMicrotasks();

      expect(plans).toHaveLength(1);
      expect(plans[0]).toMatchObject({ strategy: 'auto_summary', documentText: 'Door creaks open.' });

      jest.advanceTimersByTime(30000);
      expect(types(events)).toEqual(['summarizing', 'retrying']);

      recovery.settle(plans[0].taskId, true);
      expect(recovery.state).toBe('resolved');
    });

    it('should surface the partial summary when the timer fires first', async () => {
      const { recovery, summarizer, events, plans } = setup();
      recovery.handle(overflow('task_1_origin'));

      summarizer.partial('Mara reaches the bridge');
      jest.advanceTimersByTime(30000);

      expect(events[1]).toEqual({
        type: 'summaryForReview',
        originTaskId: 'task_1_origin',
        text: 'Mara reaches the bridge',
        source: 'partial_summary',
      });
      expect(summarizer.requests[0].options.signal.aborted).toBe(true);
      expect(recovery.state).toBe('awaiting_user');

      summarizer.resolve('Too late.');
      await flushMicrotasks();
      expect(plans).toHaveLength(0);
    });

    it('should surface the document when nothing was summarized in time', () => {
      const { recovery, events } = setup();
      recovery.handle(overflow('task_1_origin'));

      jest.advanceTimersByTime(29999);
      expect(types(events)).toEqual(['summarizing']);

      jest.advanceTimersByTime(1);
      expect(events[1]).toEqual({
        type: 'summaryForReview',
        originTaskId: 'task_1_origin',
        text: document,
        source: 'document',
      });
    });

    it('should require manual input when the summarizer fails', async () => {
      const { recovery, summarizer, events } = setup();
      recovery.handle(overflow('task_1_origin', request(), 'Partial'));

      summarizer.reject(new Error('summary service down'));
      await flushMicrotasks();

      expect(types(events)).toEqual(['summarizing', 'manualInterventionRequired']);
      expect(events[1]).toMatchObject({ partialOutput: 'Partial', maxTokens: 2000 });
      expect(jest.getTimerCount()).toBe(0);
    });

    it('should require manual input when the summary is blank', async () => {
      const { recovery, summarizer, events, plans } = setup();
      recovery.handle(overflow('task_1_origin'));

      summarizer.resolve('   ');
      await flushMicrotasks();

      expect(plans).toHaveLength(0);
      expect(types(events)).toEqual(['summarizing', 'manualInterventionRequired']);
    });

    it('should go manual without a summarizer', () => {
      const { recovery, events } = setup(false);

      recovery.handle(overflow('task_1_origin'));

      expect(types(events)).toEqual(['manualInterventionRequired']);
    });

    it('should go manual when there is no document to summarize', () => {
      const { recovery, summarizer, events } = setup();

      recovery.handle(overflow('task_1_origin', request({ currentDocumentText: '  ' })));

      expect(summarizer.requests).toHaveLength(0);
      expect(types(events)).toEqual(['manualInterventionRequired']);
    });

    it('should fall back to the default completion budget', () => {
      const { recovery, events } = setup(false);
      const req = request();
      req.promptConfig = { ...req.promptConfig, providerOverrides: { model: 'test-model' } };

      recovery.handle(overflow('task_1_origin', req));

      expect(events[0]).toMatchObject({ type: 'manualInterventionRequired', maxTokens: 2000 });
    });
  });

  describe('manual strategies', () => {
    it('should retry with a user summary', () => {
      const { recovery, plans } = setup(false);
      recovery.handle(overflow('task_1_origin'));

      const taskId = recovery.useSummary('  My own synopsis. ');

      expect(plans[0]).toMatchObject({ taskId, strategy: 'manual_summary', documentText: 'My own synopsis.' });
    });

    it('should let the user summary preempt a running summarizer', async () => {
      const { recovery, summarizer, plans } = setup();
      recovery.handle(overflow('task_1_origin'));

      recovery.useSummary('Mine.');
      summarizer.resolve('Theirs.');
      await flushMicrotasks();

      expect(plans.map(plan => plan.strategy)).toEqual(['manual_summary']);
      expect(summarizer.requests[0].options.signal.aborted).toBe(true);
      expect(jest.getTimerCount()).toBe(0);
    });

    it('should truncate to half the completion budget', () => {
      const { recovery, plans } = setup(false);
      const longDocument = Array.from({ length: 3000 }, (_, i) => `word${i}`).join(' ');
      const tail = jest.spyOn(estimator, 'tail');
      recovery.handle(overflow('task_1_origin', request({ currentDocumentText: longDocument })));

      recovery.truncate();

      expect(tail).toHaveBeenCalledWith(longDocument, 1000);
      const window = tail.mock.results[0].value;
      expect(window.tokenCount).toBeLessThanOrEqual(1000);
      expect(plans[0].strategy).toBe('truncated');
      expect(plans[0].documentText).toBe(window.text);
      expect(longDocument.endsWith(plans[0].documentText)).toBe(true);
      tail.mockRestore();
    });

    it('should report exhaustion when the truncated retry overflows', () => {
      const { recovery, events, plans } = setup(false);
      recovery.handle(overflow('task_1_origin'));
      recovery.truncate();

      recovery.handle(overflow(plans[0].taskId));

      const last = events[events.length - 1];
      expect(last.type).toBe('exhausted');
      if (last.type === 'exhausted') {
        expect(last.error).toBeInstanceOf(RecoveryExhaustedError);
        expect(last.error.context).toEqual({ originTaskId: 'task_1_origin' });
      }
      expect(recovery.state).toBe('exhausted');
    });

    it('should reject manual strategies without a waiting flow', () => {
      const { recovery } = setup(false);

      expect(() => recovery.useSummary('text')).toThrow(RecoveryError);
      expect(() => recovery.truncate()).toThrow(RecoveryError);
    });

    it('should reject a blank user summary', () => {
      const { recovery } = setup(false);
      recovery.handle(overflow('task_1_origin'));

      expect(() => recovery.useSummary('  ')).toThrow('Summary text is empty');
    });

    it('should not accept input while a retry is running', () => {
      const { recovery } = setup(false);
      recovery.handle(overflow('task_1_origin'));
      recovery.useSummary('Mine.');

      expect(() => recovery.truncate()).toThrow(RecoveryError);
    });
  });

  describe('superseded flows', () => {
    it('should ignore the late summary of a superseded flow', async () => {
      const { recovery, summarizer, events, plans } = setup();
      recovery.handle(overflow('task_1_first'));
      recovery.handle(overflow('task_2_second'));

      expect(summarizer.requests[0].options.signal.aborted).toBe(true);

      summarizer.resolve('Stale summary.');
      await flushMicrotasks();

      expect(plans).toHaveLength(0);
      expect(recovery.originTaskId).toBe('task_2_second');
      expect(events.filter(event => event.type === 'summarizing').map(event => event.originTaskId)).toEqual([
        'task_1_first',
        'task_2_second',
      ]);
    });

    it('should drop the flow when the retry is cancelled', () => {
      const { recovery, plans } = setup(false);
      recovery.handle(overflow('task_1_origin'));
      recovery.useSummary('Mine.');

      recovery.settle(plans[0].taskId, false);

      expect(recovery.state).toBe('idle');
    });

    it('should clear timers on dispose', () => {
      const { recovery } = setup();
      recovery.handle(overflow('task_1_origin'));

      recovery.dispose();

      expect(jest.getTimerCount()).toBe(0);
      expect(recovery.state).toBe('disposed');
      expect(() => recovery.useSummary('x')).toThrow('recovery has been disposed');
    });
  });
});
