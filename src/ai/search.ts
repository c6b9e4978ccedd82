import { Board } from '../core/Board';
import { WIN_SCORE } from '../core/constants';
import { gameOver } from '../core/outcome';
import { GameState, Player, Position, SearchResult, opponentOf } from '../core/types';
import { evaluate } from './evaluator';
import { candidateMoves, orderByCenterDistance } from './moveGenerator';

/**
 * Depth-limited minimax with alpha-beta pruning.
 *
 * Scores are always from `rootPlayer`'s side: the maximizing frames place
 * `rootPlayer`'s stones and the minimizing frames place the opponent's.
 * Terminal positions are checked before the depth, so a decided board
 * scores ±WIN_SCORE (or 0 for a draw) at any depth.
 *
 * The board is mutated while exploring and restored before every return.
 * Among equally scored moves the first one in center-distance order wins.
 */
export function search(
    board: Board,
    depth: number,
    alpha: number,
    beta: number,
    maximizing: boolean,
    rootPlayer: Player
): SearchResult {
    const outcome = gameOver(board);
    if (outcome.state === GameState.WIN) {
        return { move: null, score: outcome.winner === rootPlayer ? WIN_SCORE : -WIN_SCORE };
    }
    if (outcome.state === GameState.DRAW) {
        return { move: null, score: 0 };
    }
    if (depth === 0) {
        return { move: null, score: evaluate(board, rootPlayer) };
    }

    const moves = orderByCenterDistance(candidateMoves(board));
    let bestMove: Position | null = null;

    if (maximizing) {
        let value = -Infinity;
        for (const move of moves) {
            board.putStone(move, rootPlayer);
            const { score } = search(board, depth - 1, alpha, beta, false, rootPlayer);
            board.clearCell(move);

            if (score > value) {
                value = score;
                bestMove = move;
            }
            alpha = Math.max(alpha, value);
            if (alpha >= beta) {
                break;
            }
        }
        return { move: bestMove, score: value };
    }

    const opponent = opponentOf(rootPlayer);
    let value = Infinity;
    for (const move of moves) {
        board.putStone(move, opponent);
        const { score } = search(board, depth - 1, alpha, beta, true, rootPlayer);
        board.clearCell(move);

        if (score < value) {
            value = score;
            bestMove = move;
        }
        beta = Math.min(beta, value);
        if (beta <= alpha) {
            break;
        }
    }
    return { move: bestMove, score: value };
}

/**
 * Picks a move for `player` by searching `depth` plies.
 *
 * When the search yields no move (the board is already decided, or depth
 * is 0) a candidate is drawn with `random` instead.
 */
export function chooseMove(
    board: Board,
    player: Player,
    depth: number,
    random: () => number = Math.random
): Position {
    if (!Number.isInteger(depth) || depth < 0) {
        throw new RangeError(`Search depth must be a non-negative integer, got ${depth}`);
    }

    const { move } = search(board, depth, -Infinity, Infinity, true, player);
    if (move) {
        return move;
    }

    const candidates = candidateMoves(board);
    if (candidates.length === 0) {
        throw new Error('No available moves');
    }
    const index = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
    return candidates[index];
}
