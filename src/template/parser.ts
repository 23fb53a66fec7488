/**
 * 占位符解析器
 * 把 formatSpec 拆分为文本片段和占位符片段
 *
 * 语法：
 * - {name}: 占位符，name 须匹配 [A-Za-z_][A-Za-z0-9_]*
 * - {{ / }}: 字面量 { / }
 * 其它任何花括号用法都视为定义错误
 */

import { TemplateDefinitionError } from '../core/errors.js';
import type { TemplateSegment } from './types.js';

export class PlaceholderParser {
  private static PATTERNS = {
    // {{、}}、{...} 或单独的花括号
    token: /\{\{|\}\}|\{([^{}]*)\}|[{}]/g,
    name: /^[A-Za-z_][A-Za-z0-9_]*$/,
  };

  /**
   * 解析模板
   * @throws TemplateDefinitionError 花括号不匹配或占位符名称非法
   */
  static parse(formatSpec: string): TemplateSegment[] {
    const segments: TemplateSegment[] = [];
    let literal = '';
    let lastIndex = 0;

    for (const match of formatSpec.matchAll(PlaceholderParser.PATTERNS.token)) {
      const index = match.index ?? 0;
      literal += formatSpec.slice(lastIndex, index);
      lastIndex = index + match[0].length;

      if (match[0] === '{{') {
        literal += '{';
        continue;
      }
      if (match[0] === '}}') {
        literal += '}';
        continue;
      }

      const name = match[1];
      if (name === undefined) {
        throw new TemplateDefinitionError(
          `Unmatched "${match[0]}" at position ${index} in template; use "${match[0]}${match[0]}" for a literal brace`
        );
      }
      if (!PlaceholderParser.isValidName(name)) {
        throw new TemplateDefinitionError(
          `Invalid placeholder "${match[0]}" at position ${index} in template`
        );
      }

      if (literal) {
        segments.push({ type: 'literal', value: literal });
        literal = '';
      }
      segments.push({ type: 'variable', name });
    }

    literal += formatSpec.slice(lastIndex);
    if (literal) {
      segments.push({ type: 'literal', value: literal });
    }

    return segments;
  }

  /**
   * 获取模板中使用的变量（按首次出现顺序，去重）
   */
  static extractVariables(formatSpec: string): string[] {
    const variables = new Set<string>();
    for (const segment of PlaceholderParser.parse(formatSpec)) {
      if (segment.type === 'variable') {
        variables.add(segment.name);
      }
    }
    return Array.from(variables);
  }

  /**
   * 检查占位符名称是否合法
   */
  static isValidName(name: string): boolean {
    return PlaceholderParser.PATTERNS.name.test(name);
  }
}
