export { TokenLimitRecovery, DEFAULT_RECOVERY_CONFIG } from './TokenLimitRecovery';
export {
  ServiceSummarizer,
  DEFAULT_SYNOPSIS_TEMPLATE,
  DEFAULT_SYNOPSIS_MAX_TOKENS,
  SYNOPSIS_TEMPLATE_ID,
} from './service-summarizer';
export type { ServiceSummarizerOptions } from './service-summarizer';
export type {
  RecoverableRequest,
  RecoveryConfig,
  RecoveryEvent,
  RecoveryHost,
  RecoveryState,
  RetryPlan,
  RetryStrategy,
  SummarizeOptions,
  Summarizer,
  TailTokenizer,
  TokenLimitIncident,
  TokenLimitRecoveryDependencies,
} from './types';
