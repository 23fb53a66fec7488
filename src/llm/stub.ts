/**
 * 本地桩后端
 * 不访问网络，用于测试和演示
 */

import type { CompleteOptions, CompletionBackend } from '../core/types.js';

export type CompletionHandler = (prompt: string, options: CompleteOptions) => string | Promise<string>;

/**
 * 单次调用记录
 */
export interface CompletionCall {
  prompt: string;
  options: CompleteOptions;
}

export class StubBackend implements CompletionBackend {
  private readonly history: CompletionCall[] = [];

  constructor(private readonly handler: CompletionHandler) {}

  /**
   * 已收到的调用（按顺序）
   */
  get calls(): readonly CompletionCall[] {
    return this.history;
  }

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    this.history.push({ prompt, options });
    return this.handler(prompt, options);
  }
}

/**
 * 回显后端：返回 prefix + prompt
 */
export function echoBackend(prefix: string = 'ECHO:'): StubBackend {
  return new StubBackend((prompt) => `${prefix}${prompt}`);
}

/**
 * 总是失败的后端
 */
export function failingBackend(error: Error): StubBackend {
  return new StubBackend(() => {
    throw error;
  });
}
