import {
  DEFAULT_COLS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_ROWS,
  type GameEndPayload,
  GameError,
  type PlayerScore,
  type ServerPayload,
  TileGridGame,
  type WireEndReason,
  type WireWinner,
  createGameId,
  errorMessage,
  isArenaPayload,
  isJoin,
  isMove,
  scoreBoard,
} from 'tilegrid-core';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import { DEFAULT_TURN_TIMEOUT_MS, RemotePlayer } from './remote-player.js';

export interface GameServerOptions {
  /** 0 picks a free port; read the bound one from `listening` */
  port: number;
  rows?: number;
  cols?: number;
  maxAttempts?: number;
  turnTimeoutMs?: number;
}

export interface GameServer {
  wss: WebSocketServer;
  /** Resolves with the bound port */
  listening: Promise<number>;
  close: () => void;
}

interface Connection {
  ws: WebSocket;
  name: string | null;
  player: RemotePlayer | null;
  match: Match | null;
}

interface Match {
  gameId: string;
  game: TileGridGame;
  seats: [Connection, Connection];
  ended: boolean;
}

/** Seat symbols, first joiner first */
const SYMBOLS = ['*', 'o'] as const;

export function createGameServer(options: GameServerOptions): GameServer {
  const rows = options.rows ?? DEFAULT_ROWS;
  const cols = options.cols ?? DEFAULT_COLS;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const turnTimeoutMs = options.turnTimeoutMs ?? DEFAULT_TURN_TIMEOUT_MS;
  for (const [name, value] of Object.entries({ rows, cols, maxAttempts, turnTimeoutMs })) {
    if (!Number.isInteger(value) || value < 1) {
      throw new GameError('INVALID_CONFIG', `${name} must be a positive integer, got ${value}`);
    }
  }

  const wss = new WebSocketServer({ port: options.port });
  const connections = new Set<Connection>();
  const matches = new Set<Match>();
  let waiting: Connection | null = null;

  const listening = new Promise<number>((resolve, reject) => {
    wss.once('listening', () => {
      const address = wss.address();
      resolve(typeof address === 'string' ? options.port : address.port);
    });
    wss.once('error', reject);
  });

  function send(conn: Connection, payload: ServerPayload): void {
    if (conn.ws.readyState === conn.ws.OPEN) {
      conn.ws.send(JSON.stringify(payload));
    }
  }

  function endMatch(match: Match, winner: WireWinner, reason: WireEndReason, scores: PlayerScore[]): void {
    if (match.ended) return;
    match.ended = true;
    matches.delete(match);

    const payload: GameEndPayload = { type: 'game-end', gameId: match.gameId, winner, reason, scores };
    for (const seat of match.seats) {
      send(seat, payload);
      seat.player = null;
      seat.match = null;
      seat.name = null;
    }
    console.log(`[GameServer] ${match.gameId} ended (${reason}), winner: ${winner ?? 'none'}`);
  }

  function startMatch(first: Connection, second: Connection): void {
    const gameId = createGameId();
    const seats: [Connection, Connection] = [first, second];
    const players = seats.map(
      (conn, index) =>
        new RemotePlayer(
          `p${index + 1}`,
          conn.name ?? `player ${index + 1}`,
          SYMBOLS[index],
          gameId,
          (payload) => send(conn, payload),
          turnTimeoutMs,
        ),
    );

    const game = new TileGridGame(
      players,
      { rows, cols, maxAttempts },
      {
        onMoveAccepted: (player, position, board) => {
          for (const seat of seats) {
            send(seat, {
              type: 'game-state',
              gameId,
              board: board.snapshot(),
              lastMove: { playerId: player.id, row: position.row, col: position.col },
            });
          }
        },
        onMoveRejected: (player, error) => {
          const index = players.findIndex((p) => p.id === player.id);
          if (index >= 0) send(seats[index], { type: 'move-rejected', gameId, reason: errorMessage(error) });
        },
      },
      gameId,
    );

    const match: Match = { gameId, game, seats, ended: false };
    matches.add(match);
    seats.forEach((conn, index) => {
      conn.player = players[index];
      conn.match = match;
    });

    seats.forEach((conn, index) => {
      const other = seats[1 - index];
      send(conn, {
        type: 'game-start',
        gameId,
        you: players[index].id,
        symbol: players[index].symbol,
        opponent: { name: other.name ?? players[1 - index].name, symbol: players[1 - index].symbol },
        rows,
        cols,
      });
    });
    console.log(`[GameServer] ${gameId} started: ${players[0].name} vs ${players[1].name}`);

    game
      .play()
      .then((result) => {
        if (result.reason === 'aborted') return;
        endMatch(match, result.winner, result.reason, result.scores);
      })
      .catch((error: unknown) => {
        console.error(`[GameServer] ${gameId} failed:`, error);
        endMatch(match, null, 'aborted', scoreBoard(game.getBoard(), players.map((p) => p.id)));
      });
  }

  /** A seat left mid-game: the other seat wins by disconnect */
  function abandonMatch(match: Match, leaver: Connection): void {
    const stayer = match.seats[0] === leaver ? match.seats[1] : match.seats[0];
    const players = match.game.getPlayers();
    const scores = scoreBoard(
      match.game.getBoard(),
      players.map((p) => p.id),
    );
    leaver.player?.disconnect();
    match.game.abort('disconnect');
    endMatch(match, stayer.player?.id ?? null, 'disconnect', scores);
  }

  function handleJoin(conn: Connection, name: string): void {
    if (conn.name !== null) {
      send(conn, { type: 'error', error: 'already joined' });
      return;
    }
    conn.name = name;

    if (waiting && waiting !== conn && waiting.ws.readyState === waiting.ws.OPEN) {
      const opponent = waiting;
      waiting = null;
      startMatch(opponent, conn);
      return;
    }
    waiting = conn;
    send(conn, { type: 'waiting' });
  }

  wss.on('connection', (ws: WebSocket) => {
    const conn: Connection = { ws, name: null, player: null, match: null };
    connections.add(conn);

    ws.on('message', (raw: WebSocket.RawData) => {
      let msg: unknown;
      try {
        msg = JSON.parse(raw.toString());
      } catch {
        send(conn, { type: 'error', error: 'invalid JSON' });
        return;
      }

      if (!isArenaPayload(msg)) {
        send(conn, { type: 'error', error: 'unknown message type' });
        return;
      }

      if (msg.type === 'join') {
        if (!isJoin(msg)) {
          send(conn, { type: 'error', error: 'invalid payload' });
          return;
        }
        handleJoin(conn, msg.name);
        return;
      }

      if (msg.type === 'move') {
        if (!isMove(msg)) {
          send(conn, { type: 'error', error: 'invalid payload' });
          return;
        }
        if (!conn.player) {
          send(conn, { type: 'error', error: 'not in a game' });
          return;
        }
        if (!conn.player.receiveMove(msg)) {
          const reason = conn.player.isAwaitingMove() ? 'stale move: answer the latest turn-request' : 'not your turn';
          send(conn, { type: 'move-rejected', gameId: msg.gameId, reason });
        }
        return;
      }

      send(conn, { type: 'error', error: 'unknown message type' });
    });

    // ws closes the socket after a protocol error; the close handler settles the match
    ws.on('error', (err: Error) => {
      console.warn(`[GameServer] connection error (${conn.name ?? 'unjoined'}): ${err.message}`);
    });

    ws.on('close', () => {
      connections.delete(conn);
      if (waiting === conn) waiting = null;
      if (conn.match && !conn.match.ended) {
        abandonMatch(conn.match, conn);
      }
    });
  });

  return {
    wss,
    listening,
    close: () => {
      for (const match of matches) {
        match.ended = true;
        for (const seat of match.seats) seat.player?.disconnect();
        match.game.abort('server closing');
      }
      matches.clear();
      for (const conn of connections) {
        conn.ws.close();
      }
      connections.clear();
      waiting = null;
      wss.close();
    },
  };
}
