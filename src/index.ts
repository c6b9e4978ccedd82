export { Board } from './core/Board';
export { Game } from './core/Game';
export { checkFive, gameOver } from './core/outcome';
export { InvalidMoveError, InvalidMoveKind } from './core/errors';
export { BOARD_SIZE, WIN_LENGTH, DIRECTIONS, CENTER, WIN_SCORE, DEFAULT_SEARCH_DEPTH } from './core/constants';
export { PlayerColor, GameState, opponentOf } from './core/types';
export type { Position, Player, Outcome, Move, SearchResult } from './core/types';
export {
    lineScore,
    evaluateFor,
    evaluate,
    candidateMoves,
    orderByCenterDistance,
    search,
    chooseMove,
    MinimaxAIPlayer,
    playMatch
} from './ai';
export type { AIPlayer, MinimaxAIPlayerOptions, MatchOptions, MatchResult } from './ai';
