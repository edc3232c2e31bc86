import {
  type GameConfig,
  type GameResult,
  type Player,
  TileGridGame,
  errorMessage,
  renderBoard,
  symbolsFromTable,
} from 'tilegrid-core';

export const FORFEIT_MESSAGE = 'Exiting game due to too many agent retries.';

/**
 * Final report lines: one score line per player, then the outcome.
 */
export function formatSummary(result: GameResult, players: readonly Player[]): string[] {
  const lines = ['Final scores:'];
  for (const score of result.scores) {
    const player = players.find((p) => p.id === score.playerId);
    const label = player ? `${player.name} (${player.symbol})` : score.playerId;
    lines.push(`  ${label}: largest component ${score.largest}`);
  }

  if (result.winner === 'draw') {
    lines.push('Result: draw');
  } else if (result.winner !== null) {
    const winner = players.find((p) => p.id === result.winner);
    lines.push(`Winner: ${winner?.name ?? result.winner}`);
  }
  return lines;
}

/** 0 for a finished game, 1 when a seat forfeited or the game was cut short */
export function exitCodeFor(result: GameResult): number {
  return result.reason === 'board-full' ? 0 : 1;
}

/**
 * Play one game in the terminal, printing the board before every turn.
 */
export async function runLocalGame(players: readonly Player[], config: Partial<GameConfig>): Promise<GameResult> {
  const symbols = symbolsFromTable(Object.fromEntries(players.map((p) => [p.id, p.symbol])));

  const game = new TileGridGame(players, config, {
    onGameStart: () => console.log('Starting game.\n'),
    onTurnStart: (player, _turn, board) => {
      console.log(`\nPlayer ${player.name}'s turn.`);
      console.log(renderBoard(board, symbols));
    },
    onMoveRejected: (player, error, attempt) => {
      if (player.kind === 'human') return;
      console.log(`${player.name} attempt ${attempt} rejected: ${errorMessage(error)}`);
    },
  });

  const result = await game.play();

  if (result.reason === 'forfeit') {
    console.log(FORFEIT_MESSAGE);
  }
  console.log('Game ended.');
  console.log(renderBoard(game.getBoard(), symbols));
  for (const line of formatSummary(result, players)) {
    console.log(line);
  }
  return result;
}
