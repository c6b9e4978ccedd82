import { Position } from './types';

// Side length of the square board
export const BOARD_SIZE = 15;

// Stones in a row needed to win
export const WIN_LENGTH = 5;

/**
 * Line directions as (row delta, col delta): vertical, horizontal,
 * diagonal \ and diagonal /. Every scan walks them in this order.
 */
export const DIRECTIONS: ReadonlyArray<{ readonly dr: number; readonly dc: number }> = [
    { dr: 1, dc: 0 },
    { dr: 0, dc: 1 },
    { dr: 1, dc: 1 },
    { dr: 1, dc: -1 }
];

export const CENTER: Readonly<Position> = Object.freeze({
    row: Math.floor(BOARD_SIZE / 2),
    col: Math.floor(BOARD_SIZE / 2)
});

// Score of a decided game, from the searching player's side
export const WIN_SCORE = 1_000_000;

export const DEFAULT_SEARCH_DEPTH = 2;
