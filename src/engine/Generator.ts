import { ClueTargets, Difficulty, RandomSource, TraceFn } from '../types';
import { GenerationError } from '../errors';
import { DEFAULT_MAX_FILL_ATTEMPTS } from '../defaults';
import { Grid } from './Grid';
import { Solver } from './Solver';
import { CELL_COUNT, DIGITS, toCoord } from './Rules';
import { mulberry32, shuffle } from './Random';
import { parseDifficulty, pickClueTarget, resolveClueTargets } from './DifficultyBounds';

/**
 * The complete result of the puzzle generation process.
 */
export interface Puzzle {
    /** The player-facing grid. Every remaining digit is a clue. */
    grid: Grid;
    /** The unique completion of `grid`. */
    solution: Grid;
    difficulty: Difficulty;
    clueCount: number;
}

/**
 * Configuration options for the puzzle generation process.
 */
export interface GeneratorOptions {
    /**
     * Seed for the built-in PRNG. Two generators with the same seed produce the same puzzles.
     * Ignored when `random` is given.
     */
    seed?: number;
    /**
     * Custom random source returning numbers in [0, 1).
     * Default: Math.random (or a seeded PRNG when `seed` is set).
     */
    random?: RandomSource;
    /**
     * Overrides the clue range of one or more difficulties.
     */
    clueTargets?: Partial<ClueTargets>;
    /**
     * How often a failed fill is restarted before giving up.
     * Default: 5.
     */
    maxFillAttempts?: number;
    /**
     * Callback for trace logs execution details.
     */
    onTrace?: TraceFn;
}

/**
 * The main class responsible for generating Sudoku puzzles.
 *
 * It fills an empty board by randomized backtracking, then removes digits one at a time
 * for as long as the puzzle keeps exactly one solution and the clue target is not reached.
 */
export class Generator {
    private random: RandomSource;
    private solver: Solver;
    private clueTargets: ClueTargets;
    private maxFillAttempts: number;
    private onTrace?: TraceFn;

    /**
     * Creates a new Generator instance.
     *
     * @throws {ConfigurationError} If the clue target overrides are invalid.
     */
    constructor(options: GeneratorOptions = {}) {
        this.random = options.random ?? (options.seed !== undefined ? mulberry32(options.seed) : Math.random);
        this.solver = new Solver();
        this.clueTargets = resolveClueTargets(options.clueTargets);
        this.maxFillAttempts = Math.max(1, options.maxFillAttempts ?? DEFAULT_MAX_FILL_ATTEMPTS);
        this.onTrace = options.onTrace;
    }

    /**
     * Generates a uniquely solvable puzzle.
     *
     * If the drawn clue target cannot be reached without losing uniqueness, the puzzle
     * keeps the closest achievable number of clues instead.
     *
     * @param difficulty - 'easy', 'medium' or 'hard'.
     * @throws {ConfigurationError} If the difficulty is unknown.
     */
    public generate(difficulty: Difficulty): Puzzle {
        const tier = parseDifficulty(difficulty);
        const target = pickClueTarget(this.clueTargets[tier], this.random);
        this.trace(`Generator: ${tier} puzzle requested, aiming for ${target} clues.`);

        const solution = this.fillGrid();
        const grid = this.carve(solution, target);
        grid.lockClues();

        const clueCount = grid.clueCount();
        if (clueCount > target) {
            this.trace(`Generator: Target not reachable, stopped at ${clueCount} clues.`);
        }
        this.trace(`Generator: Puzzle ready with ${clueCount} clues.`);

        return { grid, solution, difficulty: tier, clueCount };
    }

    /**
     * Builds a fully solved grid from an empty one, trying digits in a shuffled order per cell.
     *
     * @throws {GenerationError} If no attempt completes the grid.
     */
    public fillGrid(): Grid {
        const order = () => shuffle([...DIGITS], this.random);
        for (let attempt = 1; attempt <= this.maxFillAttempts; attempt++) {
            const outcome = this.solver.trySolve(new Grid(), order);
            if (outcome.solved && outcome.grid.isComplete()) {
                this.trace(`Generator: Solution created (attempt ${attempt}).`);
                return outcome.grid;
            }
            this.trace(`Generator: Fill attempt ${attempt} failed, retrying.`);
        }
        throw new GenerationError(`Could not fill a grid in ${this.maxFillAttempts} attempts.`);
    }

    /**
     * Removes digits from a copy of `solution` while the result stays uniquely solvable.
     *
     * Cells are tried in random order, each once: a digit whose removal admits a second
     * solution is put back and its cell is not tried again.
     *
     * @param solution - A completed grid. It is not modified.
     * @param target - Number of clues to stop at.
     */
    public carve(solution: Grid, target: number): Grid {
        const grid = solution.clone();
        const positions = shuffle(Array.from({ length: CELL_COUNT }, (_, i) => i), this.random);
        let clues = grid.filledCount();
        let rejected = 0;

        for (const index of positions) {
            if (clues <= target) break;
            const { row, col } = toCoord(index);
            const digit = grid.get(row, col);
            if (digit === 0) continue;

            grid.set(row, col, 0);
            if (this.solver.countSolutions(grid, 2) === 1) {
                clues--;
            } else {
                grid.set(row, col, digit);
                rejected++;
            }
        }

        this.trace(`Generator: Carved down to ${clues} clues (${rejected} removals rejected).`);
        return grid;
    }

    private trace(message: string): void {
        if (this.onTrace) this.onTrace(message);
    }
}

/**
 * Convenience wrapper: generates one puzzle with a fresh Generator.
 */
export function newPuzzle(difficulty: Difficulty, options: GeneratorOptions = {}): Puzzle {
    return new Generator(options).generate(difficulty);
}
