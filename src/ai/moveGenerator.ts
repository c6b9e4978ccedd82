import { Board } from '../core/Board';
import { CENTER } from '../core/constants';
import { Position, PlayerColor } from '../core/types';

/**
 * Empty cells touching at least one stone (8-neighbourhood), in row-major
 * order without duplicates. An empty board yields only the center.
 */
export function candidateMoves(board: Board): Position[] {
    if (board.isEmptyBoard()) {
        return [{ row: CENTER.row, col: CENTER.col }];
    }

    const size = board.getSize();
    const moves: Position[] = [];

    // Visiting targets in row-major order keeps the result sorted and unique
    for (let row = 0; row < size; row++) {
        for (let col = 0; col < size; col++) {
            if (board.cellAt(row, col) === PlayerColor.EMPTY && hasNeighbour(board, row, col)) {
                moves.push({ row, col });
            }
        }
    }

    return moves;
}

/**
 * Sorts closest-to-center first (Manhattan distance). Ties keep their
 * input order.
 */
export function orderByCenterDistance(moves: ReadonlyArray<Position>): Position[] {
    return [...moves].sort((a, b) => centerDistance(a) - centerDistance(b));
}

function centerDistance(position: Position): number {
    return Math.abs(position.row - CENTER.row) + Math.abs(position.col - CENTER.col);
}

function hasNeighbour(board: Board, row: number, col: number): boolean {
    for (let dr = -1; dr <= 1; dr++) {
        for (let dc = -1; dc <= 1; dc++) {
            if (dr === 0 && dc === 0) continue;
            const r = row + dr;
            const c = col + dc;
            if (board.inBounds(r, c) && board.cellAt(r, c) !== PlayerColor.EMPTY) {
                return true;
            }
        }
    }
    return false;
}
