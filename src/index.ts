/**
 * promptline - 提示词模板 + 单次补全
 *
 * 所有导出都在这里，一目了然
 */

// 核心
export { Chain, createChain } from './core/chain.js';

// 模板
export * from './template/index.js';

// 后端
export { OpenAIBackend, createOpenAIBackend, toBackendError } from './llm/openai.js';
export { StubBackend, echoBackend, failingBackend } from './llm/stub.js';

// 配置
export { loadConfig, loadConfigSync, listConfigs } from './core/config.js';

// 错误
export {
  PromptlineError,
  TemplateDefinitionError,
  MissingVariableError,
  InvalidChainError,
  BackendUnavailableError,
  BackendResponseError,
  ConfigError,
} from './core/errors.js';

// 类型
export type { CompleteOptions, CompletionBackend, ChainOptions } from './core/types.js';
export type { PromptlineErrorCode } from './core/errors.js';
export type { ModelConfig, PromptlineConfig, ConfigLoadOptions } from './core/config.js';
export type { ChatCompletionsClient, OpenAIBackendOptions } from './llm/openai.js';
export type { CompletionHandler, CompletionCall } from './llm/stub.js';
