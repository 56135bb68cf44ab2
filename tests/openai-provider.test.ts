import { describe, it, expect, vi } from 'vitest';
import { OpenAIProvider } from '../src/providers/openai.js';
import type { ChatCompletionsClient } from '../src/providers/openai.js';
import { ApiError } from '../src/utils/errors.js';

const OPTIONS = { model: 'gpt-4', temperature: 0.3, maxTokens: 4000, prompt: 'Write notes.' };

type CreateResult = Awaited<ReturnType<ChatCompletionsClient['create']>>;

function completion(content: string | null): CreateResult {
  return {
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  };
}

describe('OpenAIProvider', () => {
  it('sends the prompt and returns trimmed notes with usage', async () => {
    const create = vi.fn<ChatCompletionsClient['create']>(async () => completion('  # Notes\n- point \n'));
    const provider = new OpenAIProvider('test-secret', { completions: { create }, retryDelayMs: 0 });

    const response = await provider.generateNotes('source text', OPTIONS);

    expect(response).toEqual({
      text: '# Notes\n- point',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4',
      messages: [
        { role: 'system', content: 'Write notes.' },
        { role: 'user', content: 'Please create comprehensive notes from the following content:\n\nsource text' },
      ],
      temperature: 0.3,
      max_tokens: 4000,
    });
  });

  it('returns empty text for an empty completion', async () => {
    const create = vi.fn<ChatCompletionsClient['create']>(async () => ({ choices: [{ message: { content: null } }] }));
    const provider = new OpenAIProvider('test-secret', { completions: { create }, retryDelayMs: 0 });

    expect(await provider.generateNotes('source text', OPTIONS)).toEqual({ text: '' });
  });

  it('retries transient failures', async () => {
    const create = vi.fn<ChatCompletionsClient['create']>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(completion('# Notes'));
    const provider = new OpenAIProvider('test-secret', { completions: { create }, retryDelayMs: 0 });

    expect((await provider.generateNotes('source text', OPTIONS)).text).toBe('# Notes');
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured attempts', async () => {
    const create = vi.fn<ChatCompletionsClient['create']>().mockRejectedValue(new Error('socket hang up'));
    const provider = new OpenAIProvider('test-secret', { completions: { create }, maxRetries: 2, retryDelayMs: 0 });

    await expect(provider.generateNotes('source text', OPTIONS)).rejects.toThrow(
      'Operation failed after 2 attempts: socket hang up'
    );
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('does not retry authentication errors', async () => {
    const create = vi.fn<ChatCompletionsClient['create']>().mockRejectedValue(new Error('401 Unauthorized'));
    const provider = new OpenAIProvider('test-secret', { completions: { create }, retryDelayMs: 0 });

    await expect(provider.generateNotes('source text', OPTIONS)).rejects.toThrow(
      'Authentication failed: 401 Unauthorized'
    );
    expect(create).toHaveBeenCalledTimes(1);
  });

  it('rejects empty content before calling the API', async () => {
    const create = vi.fn<ChatCompletionsClient['create']>();
    const provider = new OpenAIProvider('test-secret', { completions: { create }, retryDelayMs: 0 });

    await expect(provider.generateNotes('   ', OPTIONS)).rejects.toThrow(ApiError);
    expect(create).not.toHaveBeenCalled();
  });
});
