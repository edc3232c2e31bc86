import type { ChatMessage, CompletionFn } from './llm-player.js';

export const DEFAULT_MODEL = 'gpt-4';

/**
 * The slice of the OpenAI SDK client this adapter calls. An `OpenAI` instance satisfies it.
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: { model: string; messages: ChatMessage[]; temperature?: number },
        options?: { signal?: AbortSignal },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAICompletionOptions {
  model?: string;
  temperature?: number;
}

/**
 * Wrap the chat completions endpoint as a CompletionFn. API errors propagate to
 * the turn loop, which counts them as failed attempts.
 */
export function createOpenAICompletion(client: ChatCompletionsApi, options: OpenAICompletionOptions = {}): CompletionFn {
  const model = options.model ?? DEFAULT_MODEL;
  return async (messages, signal) => {
    const body: { model: string; messages: ChatMessage[]; temperature?: number } = { model, messages };
    if (options.temperature !== undefined) body.temperature = options.temperature;
    const completion = await client.chat.completions.create(body, { signal });
    return completion.choices[0]?.message.content ?? null;
  };
}
