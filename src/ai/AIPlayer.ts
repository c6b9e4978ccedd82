import { Board } from '../core/Board';
import { DEFAULT_SEARCH_DEPTH } from '../core/constants';
import { Position, Player } from '../core/types';
import { chooseMove } from './search';

/**
 * Interface for AI players
 * Implement this interface to plug a different move source into a Game
 */
export interface AIPlayer {
    /**
     * Gets the next move for the AI player
     * @param board - The current game board; must be left as it was found
     * @param color - The color the AI is playing
     * @returns A promise that resolves to the chosen position
     */
    getMove(board: Board, color: Player): Promise<Position>;
}

export interface MinimaxAIPlayerOptions {
    /** Plies to search, defaults to DEFAULT_SEARCH_DEPTH */
    depth?: number;
    /** Source for the fallback pick when the search returns no move */
    random?: () => number;
}

/**
 * Alpha-beta minimax player
 */
export class MinimaxAIPlayer implements AIPlayer {
    private readonly depth: number;
    private readonly random: () => number;

    constructor(options: MinimaxAIPlayerOptions = {}) {
        const depth = options.depth ?? DEFAULT_SEARCH_DEPTH;
        if (!Number.isInteger(depth) || depth < 0) {
            throw new RangeError(`Search depth must be a non-negative integer, got ${depth}`);
        }
        this.depth = depth;
        this.random = options.random ?? Math.random;
    }

    public getDepth(): number {
        return this.depth;
    }

    public async getMove(board: Board, color: Player): Promise<Position> {
        return chooseMove(board, color, this.depth, this.random);
    }
}
