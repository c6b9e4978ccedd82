/**
 * Represents a position on the Gomoku board
 */
export interface Position {
    row: number;
    col: number;
}

/**
 * Represents the content of a board cell
 */
export enum PlayerColor {
    BLACK = 'BLACK',
    WHITE = 'WHITE',
    EMPTY = 'EMPTY'
}

/**
 * A side in the game. EMPTY is a cell state, never a player.
 */
export type Player = PlayerColor.BLACK | PlayerColor.WHITE;

/**
 * Represents the state of the game
 */
export enum GameState {
    IN_PROGRESS = 'IN_PROGRESS',
    WIN = 'WIN',
    DRAW = 'DRAW'
}

/**
 * Result of inspecting a board for a finished game
 */
export type Outcome =
    | { state: GameState.IN_PROGRESS }
    | { state: GameState.WIN; winner: Player }
    | { state: GameState.DRAW };

/**
 * Represents a move in the game
 */
export interface Move {
    position: Position;
    color: Player;
}

/**
 * Move picked by the search together with its minimax score.
 * `move` is null at terminal and depth-0 nodes.
 */
export interface SearchResult {
    move: Position | null;
    score: number;
}

export function opponentOf(player: Player): Player {
    return player === PlayerColor.BLACK ? PlayerColor.WHITE : PlayerColor.BLACK;
}
