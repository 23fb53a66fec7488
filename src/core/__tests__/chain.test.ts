import { describe, it, expect, vi } from 'vitest';
import { Chain, createChain } from '../chain.js';
import { Template } from '../../template/template.js';
import { StubBackend, echoBackend, failingBackend } from '../../llm/stub.js';
import {
  BackendResponseError,
  BackendUnavailableError,
  InvalidChainError,
  MissingVariableError,
} from '../errors.js';
import type { CompletionBackend } from '../types.js';

const summaryTemplate = () =>
  new Template(
    ['text', 'num_sentences'],
    'Summarize the following text in {num_sentences} sentences:\n\n{text}'
  );

describe('Chain construction', () => {
  it('rejects a missing template', () => {
    const backend = echoBackend();
    expect(() => Reflect.construct(Chain, [null, backend])).toThrow(InvalidChainError);
  });

  it('rejects a missing backend', () => {
    expect(() => Reflect.construct(Chain, [summaryTemplate(), undefined])).toThrow(
      'Chain requires a backend with a complete() method'
    );
  });

  it('rejects a backend without complete()', () => {
    const notABackend = { complete: 'yes' };
    expect(() => Reflect.construct(Chain, [summaryTemplate(), notABackend])).toThrow(InvalidChainError);
  });

  it('exposes the template and backend', () => {
    const template = summaryTemplate();
    const backend = echoBackend();
    const chain = createChain(template, backend);
    expect(chain.template).toBe(template);
    expect(chain.backend).toBe(backend);
  });
});

describe('Chain.invoke', () => {
  it('sends the rendered prompt to the backend and returns its output', async () => {
    const chain = new Chain(summaryTemplate(), echoBackend('ECHO:'));
    await expect(chain.invoke({ text: 'hi', num_sentences: 2 })).resolves.toBe(
      'ECHO:Summarize the following text in 2 sentences:\n\nhi'
    );
  });

  it('calls the backend exactly once per invocation', async () => {
    const backend = echoBackend();
    const chain = new Chain(summaryTemplate(), backend);
    await chain.invoke({ text: 'a', num_sentences: 1 });
    await chain.invoke({ text: 'b', num_sentences: 1 });
    expect(backend.calls.map((call) => call.prompt)).toEqual([
      'Summarize the following text in 1 sentences:\n\na',
      'Summarize the following text in 1 sentences:\n\nb',
    ]);
  });

  it('does not call the backend when rendering fails', async () => {
    const backend = echoBackend();
    const chain = new Chain(summaryTemplate(), backend);
    await expect(chain.invoke({ text: 'hi' })).rejects.toThrow(MissingVariableError);
    expect(backend.calls).toHaveLength(0);
  });

  it('propagates backend errors unchanged', async () => {
    const failure = new BackendUnavailableError('connection refused');
    const chain = new Chain(summaryTemplate(), failingBackend(failure));
    const bindings = { text: 'hi', num_sentences: 2 };

    await expect(chain.invoke(bindings)).rejects.toBe(failure);
    expect(bindings).toEqual({ text: 'hi', num_sentences: 2 });
  });

  it('returns backend output verbatim', async () => {
    const output = '  \n raw output with trailing space ';
    const chain = new Chain(summaryTemplate(), new StubBackend(() => output));
    await expect(chain.invoke({ text: 'x', num_sentences: 1 })).resolves.toBe(output);
  });

  it('does not inspect empty output', async () => {
    const chain = new Chain(summaryTemplate(), new StubBackend(() => ''));
    await expect(chain.invoke({ text: 'x', num_sentences: 1 })).resolves.toBe('');
  });

  it('forwards the configured model', async () => {
    const backend = echoBackend();
    const chain = new Chain(summaryTemplate(), backend, { model: 'gpt-4o' });
    await chain.invoke({ text: 'x', num_sentences: 1 });
    expect(backend.calls[0].options).toEqual({ model: 'gpt-4o' });
  });

  it('passes empty options when no model is configured', async () => {
    const complete = vi.fn(async (prompt: string) => prompt.toUpperCase());
    const backend: CompletionBackend = { complete };
    const chain = new Chain(Template.fromString('say {word}'), backend);

    await expect(chain.invoke({ word: 'hi' })).resolves.toBe('SAY HI');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith('say hi', {});
  });

  it('does not retry after a response error', async () => {
    const backend = failingBackend(new BackendResponseError('empty'));
    const chain = new Chain(summaryTemplate(), backend);
    await expect(chain.invoke({ text: 'x', num_sentences: 1 })).rejects.toThrow(BackendResponseError);
    expect(backend.calls).toHaveLength(1);
  });
});

describe('Chain.render', () => {
  it('renders without calling the backend', () => {
    const backend = echoBackend();
    const chain = new Chain(summaryTemplate(), backend);
    expect(chain.render({ text: 'hi', num_sentences: 4 })).toBe(
      'Summarize the following text in 4 sentences:\n\nhi'
    );
    expect(backend.calls).toHaveLength(0);
  });
});
