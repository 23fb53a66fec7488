/**
 * 错误类型
 * 所有错误都带 code，调用方按 code 或 instanceof 区分
 */

export type PromptlineErrorCode =
  | 'TEMPLATE_DEFINITION'
  | 'MISSING_VARIABLE'
  | 'INVALID_CHAIN'
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_RESPONSE'
  | 'INVALID_CONFIG';

/**
 * 基础错误
 */
export class PromptlineError extends Error {
  constructor(
    message: string,
    public readonly code: PromptlineErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PromptlineError';
  }
}

/**
 * 模板定义错误（构造时检测，不可重试）
 */
export class TemplateDefinitionError extends PromptlineError {
  constructor(message: string) {
    super(message, 'TEMPLATE_DEFINITION');
    this.name = 'TemplateDefinitionError';
  }
}

/**
 * 缺少变量绑定
 * variable 为按声明顺序第一个缺失的变量，missing 为全部缺失变量
 */
export class MissingVariableError extends PromptlineError {
  constructor(
    public readonly variable: string,
    public readonly missing: readonly string[] = [variable]
  ) {
    super(`Missing value for template variable "${variable}"`, 'MISSING_VARIABLE');
    this.name = 'MissingVariableError';
  }
}

/**
 * Chain 构造参数错误
 */
export class InvalidChainError extends PromptlineError {
  constructor(message: string) {
    super(message, 'INVALID_CHAIN');
    this.name = 'InvalidChainError';
  }
}

/**
 * 后端暂时不可用（网络、超时、鉴权、限流），调用方可重试
 */
export class BackendUnavailableError extends PromptlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BACKEND_UNAVAILABLE', options);
    this.name = 'BackendUnavailableError';
  }
}

/**
 * 后端返回了无法使用的结果
 */
export class BackendResponseError extends PromptlineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BACKEND_RESPONSE', options);
    this.name = 'BackendResponseError';
  }
}

/**
 * 配置文件错误
 */
export class ConfigError extends PromptlineError {
  constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'INVALID_CONFIG', options);
    this.name = 'ConfigError';
  }
}
