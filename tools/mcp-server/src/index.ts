/**
 * tilegrid MCP server
 *
 * Lets an LLM play the connected components game through Model Context
 * Protocol tools, against one of the built-in baseline players.
 *
 * @see https://modelcontextprotocol.io for MCP specification
 */

import { GreedyPlayer, type RandomSource, RandomPlayer, buildGameContext } from 'tilegrid-agents';
import {
  DEFAULT_COLS,
  DEFAULT_ROWS,
  type GameEndReason,
  GameError,
  type GameResult,
  type MoveContext,
  OPPONENT_SYMBOL,
  OWN_SYMBOL,
  type Player,
  TileGridGame,
  errorMessage,
  formatPosition,
  perspectiveSymbols,
  renderBoard,
} from 'tilegrid-core';
import { ToolSeat } from './tool-seat.js';

export const MCP_SERVER_VERSION = '0.1.0';

export type OpponentKind = 'random' | 'greedy';
export const OPPONENT_KINDS: readonly OpponentKind[] = ['random', 'greedy'];

export interface McpTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: string; description: string; enum?: string[] }>;
    required: string[];
  };
}

export interface McpToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

export interface McpToolResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface TileGridMcpOptions {
  rows?: number;
  cols?: number;
  opponent?: OpponentKind;
  /** RNG for the random opponent */
  random?: RandomSource;
}

/** What the LLM sees after every tool call */
export interface GameView {
  gameId: string;
  status: 'your-turn' | 'over';
  you: string;
  opponent: { name: string; symbol: string };
  board: string[];
  openPositions: string[];
  lastOpponentMove: string | null;
  result?: {
    winner: 'you' | 'opponent' | 'draw' | null;
    reason: GameEndReason;
    scores: { you: number; opponent: number };
  };
}

interface Session {
  game: TileGridGame;
  seat: ToolSeat;
  opponent: Player;
  finished: Promise<GameResult>;
}

const SEAT_ID = 'you';
const OPPONENT_ID = 'opponent';

function isOpponentKind(value: unknown): value is OpponentKind {
  return value === 'random' || value === 'greedy';
}

/** Largest row or column count a tool call may ask for */
export const MAX_BOARD_SIDE = 50;

function readBoardSide(args: Record<string, unknown>, name: string, fallback: number): number {
  const value = args[name];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new GameError('INVALID_CONFIG', `${name} must be a positive integer, got ${JSON.stringify(value)}`);
  }
  if (value > MAX_BOARD_SIDE) {
    throw new GameError('INVALID_CONFIG', `${name} must be at most ${MAX_BOARD_SIDE}, got ${value}`);
  }
  return value;
}

/**
 * tilegrid MCP server - one game at a time, the caller against a baseline bot
 */
export class TileGridMcpServer {
  private session: Session | null = null;
  private readonly rows: number;
  private readonly cols: number;
  private readonly opponentKind: OpponentKind;
  private readonly random: RandomSource;

  constructor(options: TileGridMcpOptions = {}) {
    this.rows = options.rows ?? DEFAULT_ROWS;
    this.cols = options.cols ?? DEFAULT_COLS;
    this.opponentKind = options.opponent ?? 'greedy';
    this.random = options.random ?? Math.random;
  }

  /**
   * Get available tools for the MCP protocol
   */
  getTools(): McpTool[] {
    return [
      {
        name: 'tilegrid_new_game',
        description: 'Start a new game against a baseline bot. Replaces any game in progress.',
        inputSchema: {
          type: 'object',
          properties: {
            rows: { type: 'number', description: `Board rows, 1 to ${MAX_BOARD_SIDE} (default: ${this.rows})` },
            cols: { type: 'number', description: `Board columns, 1 to ${MAX_BOARD_SIDE} (default: ${this.cols})` },
            opponent: {
              type: 'string',
              description: `Baseline to play against (default: ${this.opponentKind})`,
              enum: [...OPPONENT_KINDS],
            },
            first: { type: 'string', description: 'Who moves first (default: you)', enum: ['you', 'opponent'] },
          },
          required: [],
        },
      },
      {
        name: 'tilegrid_get_state',
        description: 'Get the board, the open positions and the result once the game is over.',
        inputSchema: {
          type: 'object',
          properties: {},
          required: [],
        },
      },
      {
        name: 'tilegrid_play_move',
        description: 'Claim an empty cell. The opponent replies before this returns.',
        inputSchema: {
          type: 'object',
          properties: {
            row: { type: 'number', description: 'Zero-indexed row, 0 is the top row' },
            col: { type: 'number', description: 'Zero-indexed column, 0 is the left column' },
          },
          required: ['row', 'col'],
        },
      },
      {
        name: 'tilegrid_rules',
        description: 'Explain the rules of the game.',
        inputSchema: {
          type: 'object',
          properties: {},
          required: [],
        },
      },
    ];
  }

  /**
   * Execute a tool call
   */
  async executeTool(call: McpToolCall): Promise<McpToolResult> {
    try {
      switch (call.name) {
        case 'tilegrid_new_game':
          return await this.handleNewGame(call.arguments);
        case 'tilegrid_get_state':
          return this.handleGetState();
        case 'tilegrid_play_move':
          return await this.handlePlayMove(call.arguments);
        case 'tilegrid_rules':
          return this.handleRules();
        default:
          return this.errorResult(`Unknown tool: ${call.name}`);
      }
    } catch (error) {
      return this.errorResult(errorMessage(error));
    }
  }

  /** Stop the game in progress, if any */
  close(): void {
    this.session?.game.abort('server closing');
    this.session = null;
  }

  private async handleNewGame(args: Record<string, unknown>): Promise<McpToolResult> {
    const rows = readBoardSide(args, 'rows', this.rows);
    const cols = readBoardSide(args, 'cols', this.cols);
    const opponentKind = args.opponent ?? this.opponentKind;
    if (!isOpponentKind(opponentKind)) {
      throw new GameError('INVALID_CONFIG', `opponent must be one of ${OPPONENT_KINDS.join(', ')}`);
    }
    const first = args.first ?? 'you';
    if (first !== 'you' && first !== 'opponent') {
      throw new GameError('INVALID_CONFIG', 'first must be "you" or "opponent"');
    }

    const seat = new ToolSeat(SEAT_ID, 'you', OWN_SYMBOL);
    const opponent =
      opponentKind === 'random'
        ? new RandomPlayer(OPPONENT_ID, 'random', OPPONENT_SYMBOL, this.random)
        : new GreedyPlayer(OPPONENT_ID, 'greedy', OPPONENT_SYMBOL);
    const players = first === 'you' ? [seat, opponent] : [opponent, seat];
    const game = new TileGridGame(players, { rows, cols });

    this.close();
    const finished = game.play();
    finished.catch((error: unknown) => {
      console.error('[TileGridMcp] game failed:', error);
    });
    const session: Session = { game, seat, opponent, finished };
    this.session = session;

    await this.waitForSeat(session);
    return this.successResult(JSON.stringify(this.describe(session), null, 2));
  }

  private handleGetState(): McpToolResult {
    const session = this.requireSession();
    return this.successResult(JSON.stringify(this.describe(session), null, 2));
  }

  private async handlePlayMove(args: Record<string, unknown>): Promise<McpToolResult> {
    const session = this.requireSession();
    const { row, col } = args;
    if (typeof row !== 'number' || typeof col !== 'number') {
      return this.errorResult('row and col must be numbers');
    }
    if (session.game.isGameOver()) {
      return this.errorResult('The game is over. Call tilegrid_new_game to play again.');
    }
    if (!session.seat.submit({ row, col })) {
      return this.errorResult('It is not your turn');
    }

    const request = await this.waitForSeat(session);
    if (request && request.attempt > 1) {
      const reason = request.feedback[request.feedback.length - 1] ?? 'Move rejected';
      return this.errorResult(`${reason} Try another open position.`);
    }
    return this.successResult(JSON.stringify(this.describe(session), null, 2));
  }

  private handleRules(): McpToolResult {
    const config = this.session?.game.getConfig() ?? { rows: this.rows, cols: this.cols };
    return this.successResult(
      JSON.stringify(
        {
          rules: buildGameContext({ rows: config.rows, cols: config.cols }),
          howToPlay: 'Call tilegrid_play_move with a zero-indexed row and col. Your cells show as o, the opponent as *.',
        },
        null,
        2,
      ),
    );
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new GameError('GAME_OVER', 'No game in progress. Call tilegrid_new_game first.');
    }
    return this.session;
  }

  /** Resolves with the seat's next move request, or null once the game has ended */
  private waitForSeat(session: Session): Promise<MoveContext | null> {
    return Promise.race([session.seat.nextRequest(), session.finished.then(() => null)]);
  }

  private describe(session: Session): GameView {
    const { game, seat, opponent } = session;
    const state = game.getState();
    const board = game.getBoard();
    const opponentMoves = state.moves.filter((m) => m.playerId === opponent.id);
    const lastOpponentMove = opponentMoves[opponentMoves.length - 1];

    const view: GameView = {
      gameId: state.gameId,
      status: state.isOver ? 'over' : 'your-turn',
      you: seat.symbol,
      opponent: { name: opponent.name, symbol: opponent.symbol },
      board: renderBoard(board, perspectiveSymbols(seat.id)).split('\n'),
      openPositions: board.openPositions().map(formatPosition),
      lastOpponentMove: lastOpponentMove ? formatPosition(lastOpponentMove.position) : null,
    };

    if (state.result) {
      const { winner, reason, scores } = state.result;
      const largestOf = (id: string) => scores.find((s) => s.playerId === id)?.largest ?? 0;
      view.result = {
        winner: winner === null || winner === 'draw' ? winner : winner === seat.id ? 'you' : 'opponent',
        reason,
        scores: { you: largestOf(seat.id), opponent: largestOf(opponent.id) },
      };
    }
    return view;
  }

  private successResult(text: string): McpToolResult {
    return {
      content: [{ type: 'text', text }],
    };
  }

  private errorResult(message: string): McpToolResult {
    return {
      content: [{ type: 'text', text: `Error: ${message}` }],
      isError: true,
    };
  }
}

export { ToolSeat } from './tool-seat.js';
