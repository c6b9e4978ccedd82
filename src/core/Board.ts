import { BOARD_SIZE, DIRECTIONS, WIN_LENGTH } from './constants';
import { InvalidMoveError, InvalidMoveKind } from './errors';
import { Position, PlayerColor, Player } from './types';

/**
 * Represents the Gomoku game board
 */
export class Board {
    private readonly size: number = BOARD_SIZE;
    private board: PlayerColor[][];

    constructor() {
        this.board = this.createEmptyBoard();
    }

    /**
     * Builds a board from a grid held by the caller. The grid is copied.
     */
    public static fromSnapshot(cells: ReadonlyArray<ReadonlyArray<PlayerColor>>): Board {
        if (cells.length !== BOARD_SIZE || cells.some(row => row.length !== BOARD_SIZE)) {
            throw new Error('Invalid board snapshot');
        }
        const board = new Board();
        board.board = cells.map(row => [...row]);
        return board;
    }

    /**
     * Creates an empty board
     */
    private createEmptyBoard(): PlayerColor[][] {
        return Array.from({ length: this.size }, () =>
            Array<PlayerColor>(this.size).fill(PlayerColor.EMPTY)
        );
    }

    /**
     * Gets the size of the board
     */
    public getSize(): number {
        return this.size;
    }

    /**
     * Gets the color at a specific position
     */
    public getCell(position: Position): PlayerColor {
        if (!this.isValidPosition(position)) {
            throw new Error('Invalid position');
        }
        return this.board[position.row][position.col];
    }

    /**
     * Unchecked read for engine loops that already tested inBounds
     */
    public cellAt(row: number, col: number): PlayerColor {
        return this.board[row][col];
    }

    /**
     * Places a stone for a player, rejecting bad coordinates and taken cells
     */
    public placeStone(position: Position, color: Player): void {
        if (!this.isValidPosition(position)) {
            throw new InvalidMoveError(InvalidMoveKind.OUT_OF_BOUNDS, position);
        }
        if (this.board[position.row][position.col] !== PlayerColor.EMPTY) {
            throw new InvalidMoveError(InvalidMoveKind.CELL_OCCUPIED, position);
        }
        this.board[position.row][position.col] = color;
    }

    /**
     * Places a stone without validation. Every call made while searching
     * must be paired with clearCell on the same position.
     */
    public putStone(position: Position, color: Player): void {
        this.board[position.row][position.col] = color;
    }

    /**
     * Empties a cell without validation
     */
    public clearCell(position: Position): void {
        this.board[position.row][position.col] = PlayerColor.EMPTY;
    }

    public inBounds(row: number, col: number): boolean {
        return row >= 0 && row < this.size && col >= 0 && col < this.size;
    }

    /**
     * Checks if a position is valid
     */
    public isValidPosition(position: Position): boolean {
        return (
            Number.isInteger(position.row) &&
            Number.isInteger(position.col) &&
            this.inBounds(position.row, position.col)
        );
    }

    /**
     * Checks if a position is empty
     */
    public isEmpty(position: Position): boolean {
        return this.getCell(position) === PlayerColor.EMPTY;
    }

    /**
     * Checks if the board is full
     */
    public isFull(): boolean {
        return this.board.every(row => row.every(cell => cell !== PlayerColor.EMPTY));
    }

    /**
     * Checks if no stone has been placed yet
     */
    public isEmptyBoard(): boolean {
        return this.board.every(row => row.every(cell => cell === PlayerColor.EMPTY));
    }

    /**
     * Resets the board to empty state
     */
    public reset(): void {
        this.board = this.createEmptyBoard();
    }

    /**
     * Gets a copy of the current board state
     */
    public getBoard(): PlayerColor[][] {
        return this.board.map(row => [...row]);
    }

    /**
     * Checks if the stone of `color` at `position` is part of five or more
     * in a row. The cell is assumed to hold `color`.
     */
    public checkWin(position: Position, color: Player): boolean {
        for (const { dr, dc } of DIRECTIONS) {
            if (this.countInLine(position, color, dr, dc) >= WIN_LENGTH) {
                return true;
            }
        }

        return false;
    }

    /**
     * Counts consecutive stones in a line (both directions)
     */
    private countInLine(position: Position, color: Player, dr: number, dc: number): number {
        let count = 1; // Count the current stone

        count += this.countDirection(position, color, dr, dc);
        count += this.countDirection(position, color, -dr, -dc);

        return count;
    }

    /**
     * Counts consecutive stones in one direction
     */
    private countDirection(position: Position, color: Player, dr: number, dc: number): number {
        let count = 0;
        let row = position.row + dr;
        let col = position.col + dc;

        while (this.inBounds(row, col) && this.board[row][col] === color) {
            count++;
            row += dr;
            col += dc;
        }

        return count;
    }
}
