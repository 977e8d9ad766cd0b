#!/usr/bin/env node
/**
 * prose-dispatch CLI
 *
 * Dispatch a scene prompt and stream the continuation to stdout.
 * Status lines go to stderr.
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import { loadConfig, maskSecret, toAggregatorConfig, type AppConfig } from './src/config';
import { PromptDispatcher, type DispatchRequest } from './src/dispatcher';
import { RecoveryError, toError } from './src/errors';
import type { WorkerOutcome } from './src/generation-worker';
import { setLogLevel } from './src/logger';
import { ProviderAggregator } from './src/service-aggregator';
import type { RecoveryEvent } from './src/token-limit-recovery';
import { createTokenEstimator } from './src/token-estimator';

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.error(`${color}${message}${colors.reset}`);
}

// ============================================================================
// Option Parsing
// ============================================================================

type GlobalOptions = {
  config?: string;
  logLevel?: string;
};

type GenerateCommandOptions = {
  template: string;
  templateId: string;
  beats?: string;
  beatsFile?: string;
  document?: string;
  context?: string;
  summary?: string;
  system?: string;
  var: string[];
  provider?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  summarize: boolean;
  truncateOnOverflow?: boolean;
};

type TokensCommandOptions = {
  budget?: number;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

function parseVariables(entries: string[]): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Variables take the form key=value, got "${entry}"`);
    }
    variables[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return variables;
}

async function readOptional(file: string | undefined): Promise<string | undefined> {
  return file === undefined ? undefined : readFile(file, 'utf-8');
}

async function loadCliConfig(globals: GlobalOptions): Promise<AppConfig> {
  const config = await loadConfig({
    configFile: globals.config,
    overrides: {
      logging: globals.logLevel ? { level: parseLogLevel(globals.logLevel) } : undefined,
    },
  });
  setLogLevel(config.logging.level);
  return config;
}

function parseLogLevel(value: string): AppConfig['logging']['level'] {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      throw new Error(`Unknown log level: ${value}`);
  }
}

// ============================================================================
// Generation
// ============================================================================

async function buildRequest(options: GenerateCommandOptions): Promise<DispatchRequest> {
  const [template, beatsFile, document, context] = await Promise.all([
    readFile(options.template, 'utf-8'),
    readOptional(options.beatsFile),
    readOptional(options.document),
    readOptional(options.context),
  ]);

  const providerOverrides: Record<string, string | number> = {};
  if (options.provider) providerOverrides.provider = options.provider;
  if (options.model) providerOverrides.model = options.model;
  if (options.maxTokens !== undefined) providerOverrides.maxTokens = options.maxTokens;
  if (options.temperature !== undefined) providerOverrides.temperature = options.temperature;

  return {
    actionBeats: options.beats ?? beatsFile ?? '',
    promptConfig: {
      promptTemplateId: options.templateId,
      template,
      providerOverrides,
      systemInstructions: options.system,
    },
    additionalVars: parseVariables(options.var),
    currentDocumentText: document,
    extraContext: context,
    cachedSummary: options.summary,
  };
}

function describeRecovery(event: RecoveryEvent): string {
  switch (event.type) {
    case 'summarizing':
      return `Prompt too long; summarizing the document (up to ${event.timeoutMs / 1000}s)`;
    case 'retrying':
      return `Retrying as ${event.taskId} (${event.strategy})`;
    case 'summaryForReview':
      return `Summary did not finish in time; ${event.source === 'partial_summary' ? 'partial summary' : 'document'} needs review`;
    case 'manualInterventionRequired':
      return `Prompt still too long for ${event.maxTokens} output tokens: ${event.rawMessage}`;
    case 'exhausted':
      return event.error.message;
  }
}

/**
 * Dispatch once and settle with the outcome of the final task
 */
function runToCompletion(
  dispatcher: PromptDispatcher,
  request: DispatchRequest,
  options: GenerateCommandOptions
): Promise<WorkerOutcome> {
  return new Promise<WorkerOutcome>((resolve, reject) => {
    dispatcher.on('chunk', ({ text }) => {
      process.stdout.write(text);
    });

    // Failed tasks settle through their error or through recovery
    dispatcher.on('finished', outcome => {
      if (outcome.state !== 'failed') resolve(outcome);
    });

    dispatcher.on('error', ({ error }) => reject(error));

    dispatcher.on('recovery', event => {
      log(describeRecovery(event), event.type === 'exhausted' ? colors.red : colors.yellow);
      if (event.type === 'exhausted') {
        reject(event.error);
        return;
      }
      if (event.type !== 'summaryForReview' && event.type !== 'manualInterventionRequired') {
        return;
      }

      if (!options.truncateOnOverflow) {
        reject(new RecoveryError('Prompt exceeds the context window; rerun with --summary or --truncate-on-overflow'));
        return;
      }
      try {
        dispatcher.retryWithTruncatedContext();
      } catch (error) {
        reject(toError(error));
      }
    });

    dispatcher.dispatch(request);
  });
}

// ============================================================================
// Commands
// ============================================================================

const program = new Command();

program
  .name('prose-dispatch')
  .description('Dispatch scene prompts to a text generation service')
  .version('1.0.0')
  .option('-c, --config <file>', 'JSON configuration file')
  .option('--log-level <level>', 'debug | info | warn | error | silent');

program
  .command('generate')
  .description('Assemble a prompt and stream the continuation to stdout')
  .requiredOption('-t, --template <file>', 'Prompt template file')
  .option('--template-id <id>', 'Prompt template id', 'cli')
  .option('-b, --beats <text>', 'Action beats')
  .option('--beats-file <file>', 'Read the action beats from a file')
  .option('-d, --document <file>', 'Current document text')
  .option('--context <file>', 'Extra context appended to the prompt')
  .option('--summary <text>', 'Saved summary to use if the document does not fit')
  .option('--system <text>', 'System instructions')
  .option('--var <key=value>', 'Template variable (repeatable)', collect, [])
  .option('--provider <name>', 'Provider override for this prompt')
  .option('--model <model>', 'Model override for this prompt')
  .option('--max-tokens <n>', 'Maximum output tokens', parseNumber)
  .option('--temperature <n>', 'Sampling temperature', parseNumber)
  .option('--no-summarize', 'Do not summarize the document automatically on overflow')
  .option('--truncate-on-overflow', 'Keep only the tail of the document when recovery needs input')
  .action(async (options: GenerateCommandOptions) => {
    const config = await loadCliConfig(program.opts<GlobalOptions>());
    const request = await buildRequest(options);

    const aggregator = new ProviderAggregator(toAggregatorConfig(config));
    const dispatcher = new PromptDispatcher(
      { aggregator, summarizer: options.summarize ? undefined : null },
      {
        worker: config.worker,
        recovery: config.recovery,
        tokenizer: config.tokenizer,
      }
    );

    const onInterrupt = () => {
      dispatcher.cancel().catch((error: unknown) => log(`Cancel failed: ${toError(error).message}`, colors.red));
    };
    process.once('SIGINT', onInterrupt);

    try {
      const outcome = await runToCompletion(dispatcher, request, options);
      process.stdout.write('\n');
      if (outcome.state === 'cancelled') {
        log('Cancelled', colors.yellow);
        process.exitCode = 130;
      } else if (outcome.empty) {
        log('The service returned no text', colors.yellow);
      }
    } finally {
      process.off('SIGINT', onInterrupt);
      await dispatcher.dispose();
      await aggregator.dispose();
    }
  });

program
  .command('tokens')
  .description('Estimate the prompt tokens of a file')
  .argument('<file>', 'Text file')
  .option('--budget <n>', 'Report whether the text fits this many tokens', parseNumber)
  .action(async (file: string, options: TokensCommandOptions) => {
    const config = await loadCliConfig(program.opts<GlobalOptions>());
    const text = await readFile(file, 'utf-8');

    const estimator = createTokenEstimator({ encoding: config.tokenizer.encoding });
    try {
      const estimate = estimator.estimate(text);
      console.log(`encoding: ${config.tokenizer.encoding}`);
      console.log(`tokens:   ${estimator.count(text)}`);
      console.log(`estimate: ${estimate}`);
      if (options.budget !== undefined) {
        console.log(`fits ${options.budget}: ${estimator.fits(text, options.budget) ? 'yes' : 'no'}`);
      }
    } finally {
      estimator.dispose();
    }
  });

program
  .command('config')
  .description('Show the resolved configuration')
  .action(async () => {
    const config = await loadCliConfig(program.opts<GlobalOptions>());

    log('\nProvider', colors.bright);
    log(`  name:     ${config.provider.name}`);
    log(`  model:    ${config.provider.model ?? '(provider default)'}`);
    log(`  baseUrl:  ${config.provider.baseUrl ?? '(provider default)'}`);
    log(`  apiKey:   ${maskSecret(config.provider.apiKey)}`);
    log('Worker', colors.bright);
    log(`  stopGraceMs:      ${config.worker.stopGraceMs}`);
    log('Recovery', colors.bright);
    log(`  summaryTimeoutMs: ${config.recovery.summaryTimeoutMs}`);
    log(`  truncationRatio:  ${config.recovery.truncationRatio}`);
    log(`  defaultMaxTokens: ${config.recovery.defaultMaxTokens}`);
    log('Tokenizer', colors.bright);
    log(`  encoding:         ${config.tokenizer.encoding}`);
    log('Logging', colors.bright);
    log(`  level:            ${config.logging.level}\n`);
  });

program.parseAsync().catch((error: unknown) => {
  log(`\n❌ ${toError(error).message}\n`, colors.red);
  process.exit(1);
});
