/**
 * 提示词模板
 * 构造时校验占位符约定，之后只做替换
 */

import { MissingVariableError, TemplateDefinitionError } from '../core/errors.js';
import { PlaceholderParser } from './parser.js';
import { toPromptString } from './stringify.js';
import type { Bindings, TemplateSegment } from './types.js';

export class Template {
  readonly requiredVariables: readonly string[];
  readonly formatSpec: string;
  private readonly segments: readonly TemplateSegment[];

  /**
   * @param requiredVariables 必需变量，声明顺序决定缺失检查的顺序
   * @param formatSpec 含 {name} 占位符的模板字符串
   * @throws TemplateDefinitionError 变量与占位符不一一对应
   */
  constructor(requiredVariables: readonly string[], formatSpec: string) {
    const declared = new Set<string>();
    for (const name of requiredVariables) {
      if (!PlaceholderParser.isValidName(name)) {
        throw new TemplateDefinitionError(`Invalid variable name "${name}"`);
      }
      if (declared.has(name)) {
        throw new TemplateDefinitionError(`Variable "${name}" is declared more than once`);
      }
      declared.add(name);
    }

    const segments = PlaceholderParser.parse(formatSpec);
    const used = new Set<string>();
    for (const segment of segments) {
      if (segment.type !== 'variable') continue;
      if (!declared.has(segment.name)) {
        throw new TemplateDefinitionError(
          `Placeholder "{${segment.name}}" is not a declared variable`
        );
      }
      used.add(segment.name);
    }

    const unused = requiredVariables.filter((name) => !used.has(name));
    if (unused.length > 0) {
      throw new TemplateDefinitionError(
        `Variables never used in template: ${unused.join(', ')}`
      );
    }

    this.requiredVariables = Object.freeze([...requiredVariables]);
    this.formatSpec = formatSpec;
    this.segments = Object.freeze(segments.map((segment) => Object.freeze(segment)));
    Object.freeze(this);
  }

  /**
   * 从模板字符串推断变量（按首次出现顺序）
   */
  static fromString(formatSpec: string): Template {
    return new Template(PlaceholderParser.extractVariables(formatSpec), formatSpec);
  }

  /**
   * 渲染模板
   * @throws MissingVariableError 缺少必需变量，此时不产生任何输出
   */
  render(bindings: Bindings): string {
    const values = new Map<string, string>();
    const missing: string[] = [];

    for (const name of this.requiredVariables) {
      const value = Object.hasOwn(bindings, name) ? bindings[name] : undefined;
      if (value === undefined || value === null) {
        missing.push(name);
        continue;
      }
      values.set(name, toPromptString(value));
    }

    if (missing.length > 0) {
      throw new MissingVariableError(missing[0], missing);
    }

    return this.segments
      .map((segment) =>
        segment.type === 'literal' ? segment.value : values.get(segment.name) ?? ''
      )
      .join('');
  }
}
