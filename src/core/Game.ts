import type { AIPlayer } from '../ai/AIPlayer';
import { Board } from './Board';
import { InvalidMoveError, InvalidMoveKind } from './errors';
import { gameOver } from './outcome';
import { Position, PlayerColor, Player, GameState, Move, Outcome, opponentOf } from './types';

/**
 * Represents the Gomoku game logic
 */
export class Game {
    private board: Board;
    private currentPlayer: Player;
    private outcome: Outcome;
    private moveHistory: Move[];

    constructor(board: Board = new Board()) {
        this.board = board;
        this.moveHistory = [];
        this.outcome = gameOver(board);
        this.currentPlayer = this.playerToMove();
    }

    /**
     * Gets the current board
     */
    public getBoard(): Board {
        return this.board;
    }

    /**
     * Gets the current player
     */
    public getCurrentPlayer(): Player {
        return this.currentPlayer;
    }

    /**
     * Gets the current game state
     */
    public getGameState(): GameState {
        return this.outcome.state;
    }

    public getOutcome(): Outcome {
        return this.outcome;
    }

    /**
     * Gets the move history
     */
    public getMoveHistory(): Move[] {
        return [...this.moveHistory];
    }

    /**
     * Makes a move for the current player at the specified position
     * @throws InvalidMoveError when the game is over, the position is off
     * the board or the cell is taken
     */
    public makeMove(position: Position): void {
        if (this.outcome.state !== GameState.IN_PROGRESS) {
            throw new InvalidMoveError(InvalidMoveKind.GAME_OVER, position);
        }

        this.board.placeStone(position, this.currentPlayer);

        // Record the move
        this.moveHistory.push({
            position: { row: position.row, col: position.col },
            color: this.currentPlayer
        });

        if (this.board.checkWin(position, this.currentPlayer)) {
            this.outcome = { state: GameState.WIN, winner: this.currentPlayer };
            return;
        }

        if (this.board.isFull()) {
            this.outcome = { state: GameState.DRAW };
            return;
        }

        this.currentPlayer = opponentOf(this.currentPlayer);
    }

    /**
     * Asks `ai` for the current player's move and plays it
     */
    public async playAIMove(ai: AIPlayer): Promise<Position> {
        const position = await ai.getMove(this.board, this.currentPlayer);
        this.makeMove(position);
        return position;
    }

    /**
     * Resets the game to initial state
     */
    public reset(): void {
        this.board.reset();
        this.currentPlayer = PlayerColor.BLACK;
        this.outcome = { state: GameState.IN_PROGRESS };
        this.moveHistory = [];
    }

    /**
     * Checks if a move is valid
     */
    public isValidMove(position: Position): boolean {
        if (this.outcome.state !== GameState.IN_PROGRESS) {
            return false;
        }
        return this.board.isValidPosition(position) && this.board.isEmpty(position);
    }

    /**
     * Gets the winner (if any)
     */
    public getWinner(): Player | null {
        return this.outcome.state === GameState.WIN ? this.outcome.winner : null;
    }

    /**
     * Black moves first, so on a board handed in mid-game White is to move
     * exactly when Black has one stone more.
     */
    private playerToMove(): Player {
        let black = 0;
        let white = 0;
        for (const row of this.board.getBoard()) {
            for (const cell of row) {
                if (cell === PlayerColor.BLACK) black++;
                else if (cell === PlayerColor.WHITE) white++;
            }
        }
        return black > white ? PlayerColor.WHITE : PlayerColor.BLACK;
    }
}
