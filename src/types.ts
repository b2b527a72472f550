/**
 * A cell value: 0 marks an empty cell, 1-9 a placed digit.
 */
export type CellValue = number;

/**
 * A position on the board. Both indices run from 0 to 8.
 */
export interface Coord {
    row: number;
    col: number;
}

/**
 * A single square of the board.
 */
export interface Cell extends Coord {
    value: CellValue;
    /** True for clues of the original puzzle. Clues are never overwritten. */
    fixed: boolean;
}

/**
 * Puzzle difficulty tiers, ordered from most to fewest clues.
 */
export type Difficulty = 'easy' | 'medium' | 'hard';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

/**
 * Inclusive range of clues a carved puzzle should keep.
 */
export interface ClueRange {
    min: number;
    max: number;
}

export type ClueTargets = Record<Difficulty, ClueRange>;

/**
 * A source of uniformly distributed numbers in [0, 1), e.g. `Math.random`.
 */
export type RandomSource = () => number;

/**
 * Callback for trace logs of execution details.
 */
export type TraceFn = (message: string) => void;

export function isDifficulty(value: string): value is Difficulty {
    return DIFFICULTIES.some(d => d === value);
}
