import { Grid } from '../src/engine/Grid';
import { Generator, Puzzle } from '../src/engine/Generator';
import { Difficulty } from '../src/types';

// Shifted-row pattern: every row, column and box holds 1-9 once.
export const SOLVED =
    '123456789' +
    '456789123' +
    '789123456' +
    '234567891' +
    '567891234' +
    '891234567' +
    '345678912' +
    '678912345' +
    '912345678';

// SOLVED with (1,3) (1,6) (2,3) (7,1) (7,7) emptied. Unique completion; the
// ascending search first puts a 1 at (1,3) and has to take it back.
export const FIVE_BLANKS =
    '123456789' +
    '456.89.23' +
    '789.23456' +
    '234567891' +
    '567891234' +
    '891234567' +
    '345678912' +
    '6.89123.5' +
    '912345678';

/**
 * Always hands out the same puzzle, so session and UI tests need no real generation.
 */
export class FixedGenerator extends Generator {
    public calls: Difficulty[] = [];

    constructor(private readonly clues: string = FIVE_BLANKS) {
        super({ seed: 1 });
    }

    public generate(difficulty: Difficulty): Puzzle {
        this.calls.push(difficulty);
        const grid = Grid.fromString(this.clues, { lockClues: true });
        return { grid, solution: Grid.fromString(SOLVED), difficulty, clueCount: grid.clueCount() };
    }
}
