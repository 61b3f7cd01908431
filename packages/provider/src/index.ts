export {
  ProviderRetryWrapper,
  classifyProviderError,
  isTransient,
  backoff,
  abortableSleep,
  DEFAULT_RETRY_POLICY,
} from "./retry-wrapper.js";
export type { RetryPolicy, RetryNotice, ProviderRetryWrapperOptions } from "./retry-wrapper.js";
export { ScriptedProvider, text, setOutput } from "./scripted-provider.js";
export type { ScriptedTurn, Script } from "./scripted-provider.js";
