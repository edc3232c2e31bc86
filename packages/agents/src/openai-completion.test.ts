import { describe, expect, it, vi } from 'vitest';
import type { ChatMessage } from './llm-player.js';
import { type ChatCompletionsApi, DEFAULT_MODEL, createOpenAICompletion } from './openai-completion.js';

function fakeClient(content: string | null): ChatCompletionsApi & { create: ReturnType<typeof vi.fn> } {
  const create = vi.fn().mockResolvedValue({ choices: [{ message: { content } }] });
  return { create, chat: { completions: { create } } };
}

const messages: ChatMessage[] = [{ role: 'system', content: 'rules' }];

describe('createOpenAICompletion', () => {
  it('should call chat completions with the default model', async () => {
    const client = fakeClient('2,2');
    const signal = new AbortController().signal;
    const complete = createOpenAICompletion(client);

    await expect(complete(messages, signal)).resolves.toBe('2,2');
    expect(DEFAULT_MODEL).toBe('gpt-4');
    expect(client.create).toHaveBeenCalledWith({ model: 'gpt-4', messages }, { signal });
  });

  it('should pass model and temperature overrides', async () => {
    const client = fakeClient('0,0');
    const signal = new AbortController().signal;
    await createOpenAICompletion(client, { model: 'gpt-4o-mini', temperature: 0 })(messages, signal);

    expect(client.create).toHaveBeenCalledWith({ model: 'gpt-4o-mini', messages, temperature: 0 }, { signal });
  });

  it('should return null when the model sends no content', async () => {
    const complete = createOpenAICompletion(fakeClient(null));
    await expect(complete(messages, new AbortController().signal)).resolves.toBeNull();
  });

  it('should return null when there are no choices', async () => {
    const create = vi.fn().mockResolvedValue({ choices: [] });
    const complete = createOpenAICompletion({ chat: { completions: { create } } });
    await expect(complete(messages, new AbortController().signal)).resolves.toBeNull();
  });
});
