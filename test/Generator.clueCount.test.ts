import { Generator } from '../src/engine/Generator';
import { Solver } from '../src/engine/Solver';
import { Grid } from '../src/engine/Grid';
import { DEFAULT_CLUE_TARGETS } from '../src/engine/DifficultyBounds';
import { Difficulty } from '../src/types';

describe('Generator - clue counts', () => {
    jest.setTimeout(60000);

    const SAMPLES = 4;

    const averageClues = (difficulty: Difficulty): number => {
        let total = 0;
        for (let i = 0; i < SAMPLES; i++) {
            total += new Generator({ seed: 500 + i }).generate(difficulty).clueCount;
        }
        return total / SAMPLES;
    };

    test('easy puzzles stay inside the easy range', () => {
        const { min, max } = DEFAULT_CLUE_TARGETS.easy;
        for (let i = 0; i < SAMPLES; i++) {
            const puzzle = new Generator({ seed: 10 + i }).generate('easy');
            expect(puzzle.clueCount).toBeGreaterThanOrEqual(min);
            expect(puzzle.clueCount).toBeLessThanOrEqual(max);
        }
    });

    test('harder tiers never keep more clues than their range allows', () => {
        for (const difficulty of ['medium', 'hard'] as const) {
            const puzzle = new Generator({ seed: 77 }).generate(difficulty);
            expect(puzzle.clueCount).toBeGreaterThanOrEqual(DEFAULT_CLUE_TARGETS[difficulty].min);
            expect(puzzle.clueCount).toBeLessThanOrEqual(DEFAULT_CLUE_TARGETS[difficulty].max);
        }
    });

    test('average clue count falls from easy to hard', () => {
        const easy = averageClues('easy');
        const medium = averageClues('medium');
        const hard = averageClues('hard');

        expect(easy).toBeGreaterThanOrEqual(medium);
        expect(medium).toBeGreaterThanOrEqual(hard);
    });

    test('respects custom clue targets', () => {
        const generator = new Generator({ seed: 3, clueTargets: { easy: { min: 60, max: 60 } } });
        expect(generator.generate('easy').clueCount).toBe(60);
    });

    test('stops at the closest count when the target is out of reach', () => {
        // Random carving gets stuck well above 17 clues; it must stop there without failing.
        const generator = new Generator({ seed: 11 });
        const solution = generator.fillGrid();
        const carved = generator.carve(solution, 17);

        expect(carved.filledCount()).toBeGreaterThan(17);
        expect(new Solver().countSolutions(carved)).toBe(1);
        expect(solution.emptyCount()).toBe(0);
    });

    test('carve leaves a grid that is already at the target alone', () => {
        const generator = new Generator({ seed: 4 });
        const solution = Grid.fromString('1'.padEnd(81, '.'));
        expect(generator.carve(solution, 5).toString()).toBe(solution.toString());
    });
});
