import { Position } from './types';

/**
 * Why a move was rejected
 */
export enum InvalidMoveKind {
    OUT_OF_BOUNDS = 'OUT_OF_BOUNDS',
    CELL_OCCUPIED = 'CELL_OCCUPIED',
    GAME_OVER = 'GAME_OVER'
}

const MESSAGES: Record<InvalidMoveKind, string> = {
    [InvalidMoveKind.OUT_OF_BOUNDS]: 'Position is outside the board',
    [InvalidMoveKind.CELL_OCCUPIED]: 'Cell is already occupied',
    [InvalidMoveKind.GAME_OVER]: 'Game is already over'
};

/**
 * Thrown when a caller-supplied move cannot be applied
 */
export class InvalidMoveError extends Error {
    public readonly kind: InvalidMoveKind;
    public readonly position: Position;

    constructor(kind: InvalidMoveKind, position: Position) {
        super(`${MESSAGES[kind]}: (${position.row}, ${position.col})`);
        this.name = 'InvalidMoveError';
        this.kind = kind;
        this.position = { row: position.row, col: position.col };
    }
}
