/**
 * 基础类型定义
 */

/**
 * 单次补全的可选参数
 */
export interface CompleteOptions {
  /** 模型名称，不传则由后端决定 */
  model?: string;
}

/**
 * 文本补全后端
 * Chain 只依赖这个接口，具体实现见 llm/ 目录
 *
 * 失败时抛出 BackendUnavailableError（可重试）或 BackendResponseError（结果不可用）
 */
export interface CompletionBackend {
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

/**
 * Chain 配置
 */
export interface ChainOptions {
  /** 每次调用都传给后端的模型名称 */
  model?: string;
}
