import { Board } from './Board';
import { GameState, Outcome, Player, PlayerColor, Position } from './types';

/**
 * Whether the stone at `position` completes five in a row for `player`.
 * Only meaningful when the cell holds `player`.
 */
export function checkFive(board: Board, position: Position, player: Player): boolean {
    return board.checkWin(position, player);
}

/**
 * Inspects the whole board. The first winning cell in row-major order
 * decides the winner; a full board without a five is a draw.
 */
export function gameOver(board: Board): Outcome {
    const size = board.getSize();

    for (let row = 0; row < size; row++) {
        for (let col = 0; col < size; col++) {
            const cell = board.cellAt(row, col);
            if (cell !== PlayerColor.EMPTY && checkFive(board, { row, col }, cell)) {
                return { state: GameState.WIN, winner: cell };
            }
        }
    }

    if (board.isFull()) {
        return { state: GameState.DRAW };
    }
    return { state: GameState.IN_PROGRESS };
}
