/**
 * 提示词模板
 */

// 类型定义
export type { Renderable, BindingValue, Bindings, TemplateSegment } from './types.js';

// 核心组件
export { Template } from './template.js';
export { PlaceholderParser } from './parser.js';
export { toPromptString } from './stringify.js';
