/**
 * OpenAI 补全后端
 * 实现 CompletionBackend 接口，兼容所有 OpenAI 协议的服务（通过 baseUrl）
 */

import OpenAI from 'openai';
import type { CompleteOptions, CompletionBackend } from '../core/types.js';
import { BackendResponseError, BackendUnavailableError } from '../core/errors.js';
import type { ModelConfig, PromptlineConfig } from '../core/config.js';

/**
 * 后端实际用到的 chat.completions 子集
 * OpenAI 客户端的 chat.completions 满足该接口，测试时可替换为假实现
 */
export interface ChatCompletionsClient {
  create(body: {
    model: string;
    messages: Array<{ role: 'user'; content: string }>;
    temperature?: number;
  }): PromiseLike<{
    choices: Array<{ message?: { content?: string | null } | null }>;
  }>;
}

export interface OpenAIBackendOptions {
  apiKey: string;
  /** 默认模型，调用时可通过 CompleteOptions.model 覆盖 */
  model?: string;
  baseUrl?: string;
  /** 单次请求超时（毫秒） */
  timeoutMs?: number;
  temperature?: number;
  /** 每次请求打印一行日志 */
  debug?: boolean;
  /** 自定义 completions 客户端（测试用） */
  completions?: ChatCompletionsClient;
}

// 这些状态码视为暂时性故障，调用方可以重试
const TRANSIENT_STATUS = new Set([401, 403, 408, 409, 429]);

export class OpenAIBackend implements CompletionBackend {
  private completions: ChatCompletionsClient;
  private modelName: string;
  private temperature?: number;
  private debug: boolean;

  constructor(options: OpenAIBackendOptions) {
    this.completions = options.completions ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      // 每次 complete 只发一次请求，重试由调用方决定
      maxRetries: 0,
    }).chat.completions;
    this.modelName = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature;
    this.debug = options.debug ?? false;
  }

  /**
   * 补全 - 以单条 user 消息发送提示词
   */
  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const model = options.model ?? this.modelName;

    if (this.debug) {
      console.log(`[OpenAIBackend] request model=${model} promptChars=${prompt.length}`);
    }

    let response: Awaited<ReturnType<ChatCompletionsClient['create']>>;
    try {
      response = await this.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
      });
    } catch (err) {
      throw toBackendError(err);
    }

    const content = response.choices[0]?.message?.content;
    if (typeof content !== 'string' || content.length === 0) {
      throw new BackendResponseError(`Model ${model} returned no text`);
    }
    return content;
  }
}

/**
 * 把 SDK 错误转换为后端错误，其它错误原样返回
 */
export function toBackendError(err: unknown): unknown {
  if (err instanceof OpenAI.APIConnectionError) {
    return new BackendUnavailableError(`OpenAI unreachable: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    if (status === undefined || TRANSIENT_STATUS.has(status) || status >= 500) {
      return new BackendUnavailableError(`OpenAI unavailable: ${err.message}`, { cause: err });
    }
    return new BackendResponseError(`OpenAI rejected the request: ${err.message}`, { cause: err });
  }
  return err;
}

/**
 * 从配置创建 OpenAI 后端
 *
 * @example
 *   // 方式1：传入配置文件对象（推荐）
 *   const backend = createOpenAIBackend(loadConfigSync());
 *
 * @example
 *   // 方式2：传入模型配置
 *   const backend = createOpenAIBackend(config.defaultModel);
 *
 * @example
 *   // 方式3：单独传参
 *   const backend = createOpenAIBackend(apiKey, 'gpt-4o-mini', baseUrl);
 */
export function createOpenAIBackend(config: PromptlineConfig): OpenAIBackend;
export function createOpenAIBackend(modelConfig: ModelConfig): OpenAIBackend;
export function createOpenAIBackend(
  apiKey: string,
  modelName?: string,
  baseUrl?: string
): OpenAIBackend;
export function createOpenAIBackend(
  configOrApiKey: PromptlineConfig | ModelConfig | string,
  modelName?: string,
  baseUrl?: string
): OpenAIBackend {
  if (typeof configOrApiKey === 'string') {
    return new OpenAIBackend({ apiKey: configOrApiKey, model: modelName, baseUrl });
  }
  const modelConfig = 'defaultModel' in configOrApiKey ? configOrApiKey.defaultModel : configOrApiKey;
  return new OpenAIBackend({
    apiKey: modelConfig.apiKey,
    model: modelConfig.model,
    baseUrl: modelConfig.baseUrl,
    timeoutMs: modelConfig.timeoutMs,
    temperature: modelConfig.temperature,
  });
}
