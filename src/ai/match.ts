import { BOARD_SIZE } from '../core/constants';
import { Game } from '../core/Game';
import { GameState, Move, Outcome, PlayerColor } from '../core/types';
import { AIPlayer } from './AIPlayer';

export interface MatchOptions {
    /** Stop after this many moves even if the game is undecided */
    maxMoves?: number;
    /** Called after every applied move */
    onMove?: (move: Move, game: Game) => void;
}

export interface MatchResult {
    outcome: Outcome;
    moves: Move[];
}

/**
 * Plays two AI players against each other on a fresh game, Black first
 */
export async function playMatch(
    black: AIPlayer,
    white: AIPlayer,
    options: MatchOptions = {}
): Promise<MatchResult> {
    const maxMoves = options.maxMoves ?? BOARD_SIZE * BOARD_SIZE;
    const game = new Game();

    while (game.getGameState() === GameState.IN_PROGRESS && game.getMoveHistory().length < maxMoves) {
        const color = game.getCurrentPlayer();
        const position = await game.playAIMove(color === PlayerColor.BLACK ? black : white);
        options.onMove?.({ position, color }, game);
    }

    return { outcome: game.getOutcome(), moves: game.getMoveHistory() };
}
