import { Board } from '../core/Board';
import { DIRECTIONS, WIN_LENGTH } from '../core/constants';
import { Player, PlayerColor, opponentOf } from '../core/types';

/**
 * Score of one five-cell window holding `count` stones of a single player,
 * given how many of its two ends are open.
 */
export function lineScore(count: number, openEnds: number): number {
    if (count >= WIN_LENGTH) {
        return 100_000;
    }
    if (count === 4) {
        if (openEnds === 2) return 10_000;
        return openEnds === 1 ? 1_000 : 0;
    }
    if (count === 3) {
        if (openEnds === 2) return 500;
        return openEnds === 1 ? 100 : 0;
    }
    if (count === 2) {
        if (openEnds === 2) return 10;
        return openEnds === 1 ? 2 : 0;
    }
    return 0;
}

/**
 * Sums lineScore over every five-cell window, anchored at each cell in each
 * direction, that contains no opponent stone. Overlapping windows all count.
 */
export function evaluateFor(board: Board, player: Player): number {
    const size = board.getSize();
    let score = 0;

    for (let row = 0; row < size; row++) {
        for (let col = 0; col < size; col++) {
            for (const { dr, dc } of DIRECTIONS) {
                const count = countWindow(board, row, col, dr, dc, player);
                if (count < 0) {
                    continue;
                }

                let openEnds = 0;
                if (isOpen(board, row - dr, col - dc)) openEnds++;
                if (isOpen(board, row + dr * WIN_LENGTH, col + dc * WIN_LENGTH)) openEnds++;

                score += lineScore(count, openEnds);
            }
        }
    }

    return score;
}

/**
 * Heuristic value of the board for `player`: own patterns minus the
 * opponent's. Positive favours `player`.
 */
export function evaluate(board: Board, player: Player): number {
    return evaluateFor(board, player) - evaluateFor(board, opponentOf(player));
}

/**
 * Stones of `player` in the window, or -1 when the window leaves the board
 * or holds an opponent stone
 */
function countWindow(
    board: Board,
    row: number,
    col: number,
    dr: number,
    dc: number,
    player: Player
): number {
    let count = 0;

    for (let i = 0; i < WIN_LENGTH; i++) {
        const r = row + dr * i;
        const c = col + dc * i;
        if (!board.inBounds(r, c)) {
            return -1;
        }
        const cell = board.cellAt(r, c);
        if (cell === player) {
            count++;
        } else if (cell !== PlayerColor.EMPTY) {
            return -1;
        }
    }

    return count;
}

function isOpen(board: Board, row: number, col: number): boolean {
    return board.inBounds(row, col) && board.cellAt(row, col) === PlayerColor.EMPTY;
}
