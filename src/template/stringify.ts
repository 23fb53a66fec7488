/**
 * 绑定值的规范字符串形式
 *
 * - string: 原样
 * - number: ECMAScript 最短往返形式，整数不带小数点和千分位（3 -> "3"，0.1 -> "0.1"，-0 -> "0"）
 * - bigint: 十进制数字，不带 n 后缀
 * - boolean: "true" / "false"
 * - Date: toISOString()，无效日期为 "Invalid Date"
 * - Renderable: toPromptString() 的返回值
 */

import type { BindingValue } from './types.js';

export function toPromptString(value: BindingValue): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }

  return value.toPromptString();
}
