/**
 * 配置加载
 * 从 config 目录读取 JSON 配置文件
 *
 * 提供两种方式：
 * - loadConfig() - 异步加载
 * - loadConfigSync() - 同步加载（用于进程启动时创建后端）
 *
 * 字符串中的 ${VAR_NAME} 会替换为对应环境变量，API Key 通常这样注入
 */

import { readFile, readdir } from 'fs/promises';
import { readFileSync } from 'fs';
import { resolve, dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const ModelConfigSchema = z.object({
  // 目前只有 OpenAI 协议的后端
  provider: z.literal('openai').default('openai'),
  apiKey: z.string().min(1, 'apiKey is empty (is the environment variable set?)'),
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

const PromptlineConfigSchema = z.object({
  defaultModel: ModelConfigSchema,
});

/**
 * 模型配置
 * 字段允许冗余，各后端实现只取自己需要的
 */
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

export type PromptlineConfig = z.infer<typeof PromptlineConfigSchema>;

export interface ConfigLoadOptions {
  /** 配置目录，默认项目根目录下的 config/ */
  dir?: string;
}

/**
 * 获取配置目录
 */
function getConfigDir(options: ConfigLoadOptions): string {
  if (options.dir) {
    return resolve(options.dir);
  }
  const __filename = fileURLToPath(import.meta.url);
  return join(resolve(dirname(__filename), '../..'), 'config');
}

/**
 * 读取配置文件（异步版本）
 * @param name 配置文件名（不含路径和扩展名），默认 'default'
 */
export async function loadConfig(
  name: string = 'default',
  options: ConfigLoadOptions = {}
): Promise<PromptlineConfig> {
  const configPath = resolve(getConfigDir(options), `${name}.json`);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read config file: ${configPath}`, configPath, { cause: err });
  }
  return parseConfig(content, configPath);
}

/**
 * 读取配置文件（同步版本）
 * @param name 配置文件名（不含路径和扩展名），默认 'default'
 */
export function loadConfigSync(
  name: string = 'default',
  options: ConfigLoadOptions = {}
): PromptlineConfig {
  const configPath = resolve(getConfigDir(options), `${name}.json`);

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read config file: ${configPath}`, configPath, { cause: err });
  }
  return parseConfig(content, configPath);
}

/**
 * 列出所有可用的配置文件
 */
export async function listConfigs(options: ConfigLoadOptions = {}): Promise<string[]> {
  try {
    const files = await readdir(getConfigDir(options));
    return files
      .filter(f => f.endsWith('.json'))
      .map(f => f.slice(0, -'.json'.length))
      .sort();
  } catch {
    return [];
  }
}

/**
 * 解析并校验配置内容
 */
function parseConfig(content: string, configPath: string): PromptlineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`, configPath, { cause: err });
  }

  // 替换环境变量 ${VAR_NAME}
  const result = PromptlineConfigSchema.safeParse(replaceEnvVars(raw));
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${configPath}: ${issues}`, configPath, { cause: result.error });
  }
  return result.data;
}

/**
 * 递归替换对象中的环境变量
 */
function replaceEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    // 匹配 ${VAR_NAME} 格式
    return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] ?? '';
    });
  }

  if (Array.isArray(value)) {
    return value.map(replaceEnvVars);
  }

  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = replaceEnvVars(entry);
    }
    return result;
  }

  return value;
}
