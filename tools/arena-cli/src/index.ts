export { HELP_TEXT, SEAT_KINDS, parseArgs } from './config.js';
export type { CliOptions, Env, SeatKind } from './config.js';
export { SEAT_SYMBOLS, createSeat, createSeats, openAICompletionFactory } from './seats.js';
export type { SeatDeps } from './seats.js';
export { FORFEIT_MESSAGE, exitCodeFor, formatSummary, runLocalGame } from './run-game.js';
