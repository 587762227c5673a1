export {
  LLMCallFailedError,
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
  type LLMRetryInfo,
  type LLMVisionCallConfig,
} from './utils/llm-caller';
export {
  LLMTokenUsageAggregator,
  type TokenUsage,
} from './utils/llm-token-usage-aggregator';
export { ModelCallLimiter } from './utils/model-call-limiter';
export {
  detectProvider,
  getModelId,
  type ProviderType,
} from './utils/provider-detector';
export {
  RetryExhaustedError,
  RetryPolicy,
  type RetryAttemptInfo,
  type RetryExecuteOptions,
  type RetryPolicyOptions,
} from './utils/retry-policy';
