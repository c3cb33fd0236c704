export { AgentKernel } from './kernel.js';
export type { AgentKernelOptions, RunOptions, RunResult } from './kernel.js';

export {
  MessageCodec,
  DEFAULT_MAX_TOOL_OUTPUT_CHARS,
  encodeToolOutput,
  formatInlineTools,
  serializeToolOutput,
  truncateToolOutput,
} from './message-codec.js';
export type { MessageCodecOptions } from './message-codec.js';

export { MODEL_FAMILIES, getModelFamily } from './model-families.js';
export type { ModelFamily, ToolDescriptorStyle } from './model-families.js';

export {
  parseWireToolCalls,
  parseOpenAINative,
  parseQwenNative,
  parseFunctionGemmaNative,
  parseGemmaArgs,
} from './native-parsers.js';

export {
  KeepAllHistory,
  SlidingWindowHistory,
  TokenBudgetHistory,
  createHistoryStrategy,
  estimateMessageTokens,
  repairOrphans,
  DEFAULT_MAX_HISTORY_SHARE,
} from './history.js';
export type { TokenBudgetOptions } from './history.js';

export { CompositeObserver, LoggingObserver, NullObserver, notifyObserver } from './observers.js';

export { OpenAICompatibleClient, readCompletion } from './openai-compatible-client.js';
export type { OpenAICompatibleClientOptions } from './openai-compatible-client.js';

export { PiAiClient } from './pi-ai-client.js';
export type { PiAiClientOptions } from './pi-ai-client.js';
