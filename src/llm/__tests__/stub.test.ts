import { describe, it, expect } from 'vitest';
import { StubBackend, echoBackend, failingBackend } from '../stub.js';
import { BackendUnavailableError } from '../../core/errors.js';

describe('StubBackend', () => {
  it('records each call with its options', async () => {
    const backend = new StubBackend((prompt, options) => `${options.model ?? 'default'}:${prompt}`);

    await expect(backend.complete('one')).resolves.toBe('default:one');
    await expect(backend.complete('two', { model: 'small' })).resolves.toBe('small:two');
    expect(backend.calls).toEqual([
      { prompt: 'one', options: {} },
      { prompt: 'two', options: { model: 'small' } },
    ]);
  });

  it('supports async handlers', async () => {
    const backend = new StubBackend(async (prompt) => prompt.length.toString());
    await expect(backend.complete('four')).resolves.toBe('4');
  });
});

describe('echoBackend', () => {
  it('prefixes the prompt', async () => {
    await expect(echoBackend().complete('hi')).resolves.toBe('ECHO:hi');
    await expect(echoBackend('> ').complete('hi')).resolves.toBe('> hi');
  });
});

describe('failingBackend', () => {
  it('rejects with the given error and still records the call', async () => {
    const error = new BackendUnavailableError('offline');
    const backend = failingBackend(error);

    await expect(backend.complete('hi')).rejects.toBe(error);
    expect(backend.calls).toHaveLength(1);
  });
});
