export { lineScore, evaluateFor, evaluate } from './evaluator';
export { candidateMoves, orderByCenterDistance } from './moveGenerator';
export { search, chooseMove } from './search';
export { MinimaxAIPlayer } from './AIPlayer';
export type { AIPlayer, MinimaxAIPlayerOptions } from './AIPlayer';
export { playMatch } from './match';
export type { MatchOptions, MatchResult } from './match';
