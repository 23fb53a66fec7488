/**
 * Chain
 * 模板 + 补全后端，一次 invoke 渲染一次、调用后端一次
 */

import { InvalidChainError } from './errors.js';
import { Template } from '../template/template.js';
import type { Bindings } from '../template/types.js';
import type { ChainOptions, CompleteOptions, CompletionBackend } from './types.js';

export class Chain {
  readonly template: Template;
  readonly backend: CompletionBackend;
  private readonly completeOptions: CompleteOptions;

  /**
   * @throws InvalidChainError template 或 backend 缺失
   */
  constructor(template: Template, backend: CompletionBackend, options: ChainOptions = {}) {
    if (!(template instanceof Template)) {
      throw new InvalidChainError('Chain requires a Template');
    }
    if (!backend || typeof backend.complete !== 'function') {
      throw new InvalidChainError('Chain requires a backend with a complete() method');
    }

    this.template = template;
    this.backend = backend;
    this.completeOptions = options.model !== undefined ? { model: options.model } : {};
  }

  /**
   * 渲染提示词，不调用后端
   */
  render(bindings: Bindings): string {
    return this.template.render(bindings);
  }

  /**
   * 渲染并调用后端，原样返回后端输出
   * 渲染失败时不会调用后端；错误一律原样抛出
   */
  async invoke(bindings: Bindings): Promise<string> {
    const prompt = this.template.render(bindings);
    return this.backend.complete(prompt, { ...this.completeOptions });
  }
}

/**
 * 创建 Chain
 *
 * @example
 *   const chain = createChain(Template.fromString('Translate to French: {text}'), backend);
 *   const output = await chain.invoke({ text: 'Good morning' });
 */
export function createChain(
  template: Template,
  backend: CompletionBackend,
  options?: ChainOptions
): Chain {
  return new Chain(template, backend, options);
}
