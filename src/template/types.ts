/**
 * 提示词模板 - 核心类型定义
 */

/**
 * 可自行渲染的值
 * 实现 toPromptString() 即可作为绑定值传入
 */
export interface Renderable {
  toPromptString(): string;
}

/**
 * 绑定值
 * 非字符串值统一经 toPromptString() 转换（见 stringify.ts）
 */
export type BindingValue = string | number | bigint | boolean | Date | Renderable;

/**
 * 绑定集 - 变量名到值的映射
 * null / undefined 视为缺失，多余的键会被忽略
 */
export type Bindings = Readonly<Record<string, BindingValue | null | undefined>>;

/**
 * 模板片段
 * - literal: 原样输出的文本（转义的 {{ }} 已还原）
 * - variable: 占位符
 */
export type TemplateSegment =
  | { type: 'literal'; value: string }
  | { type: 'variable'; name: string };
