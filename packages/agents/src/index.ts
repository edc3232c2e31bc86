export { LlmPlayer } from './llm-player.js';
export type { ChatMessage, ChatRole, CompletionFn, LlmPlayerOptions } from './llm-player.js';
export { DEFAULT_MODEL, createOpenAICompletion } from './openai-completion.js';
export type { ChatCompletionsApi, OpenAICompletionOptions } from './openai-completion.js';
export { ConsolePlayer, MOVE_PROMPT } from './console-player.js';
export type { LineReader } from './console-player.js';
export { GreedyPlayer, RandomPlayer } from './baseline-players.js';
export type { RandomSource } from './baseline-players.js';
export { buildFeedbackMessage, buildGameContext, buildTurnPrompt } from './prompts.js';
export type { GameContextOptions } from './prompts.js';
