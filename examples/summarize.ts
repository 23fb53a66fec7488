/**
 * 模板 + 后端使用示例
 *
 * 运行：OPENAI_API_KEY=... npx tsx examples/summarize.ts
 * 不访问网络：PROMPTLINE_DRY_RUN=1 npx tsx examples/summarize.ts
 */

import {
  Chain,
  Template,
  createOpenAIBackend,
  echoBackend,
  loadConfigSync,
} from '../src/index.js';
import type { CompletionBackend } from '../src/index.js';

function createBackend(): CompletionBackend {
  if (process.env.PROMPTLINE_DRY_RUN === '1') {
    console.log('[summarize] dry run, using echo backend');
    return echoBackend();
  }
  return createOpenAIBackend(loadConfigSync());
}

async function examples() {
  const backend = createBackend();

  // ========== 示例1: 显式声明变量 ==========
  const summarize = new Chain(
    new Template(
      ['text', 'num_sentences'],
      'Summarize the following text in {num_sentences} sentences:\n\n{text}'
    ),
    backend
  );

  const summary = await summarize.invoke({
    text: 'Cats are small carnivorous mammals. They have been kept as pets for thousands of years.',
    num_sentences: 1,
  });
  console.log('[summarize] summary:', summary);

  // ========== 示例2: 从模板字符串推断变量 ==========
  const translate = new Chain(
    Template.fromString('Translate the following text into {language}:\n\n{text}'),
    backend
  );

  const translation = await translate.invoke({ language: 'French', text: 'Good morning' });
  console.log('[summarize] translation:', translation);

  // ========== 示例3: 只渲染，不调用后端 ==========
  console.log('[summarize] prompt preview:\n' + translate.render({ language: 'German', text: 'Thank you' }));
}

// 运行示例
if (import.meta.url === `file://${process.argv[1]}`) {
  examples().catch((err) => {
    console.error('[summarize] failed:', err);
    process.exitCode = 1;
  });
}
