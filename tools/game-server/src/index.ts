export const GAME_SERVER_VERSION = '0.1.0';

export { createGameServer } from './server.js';
export type { GameServer, GameServerOptions } from './server.js';
export { DEFAULT_TURN_TIMEOUT_MS, RemotePlayer } from './remote-player.js';
export type { SendPayload } from './remote-player.js';
