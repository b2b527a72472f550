import { Coord, Difficulty, TraceFn } from '../types';
import { ConfigurationError, SessionClosedError } from '../errors';
import { DEFAULT_DIFFICULTY } from '../defaults';
import { Command } from './Command';
import { Generator, GeneratorOptions, Puzzle } from './Generator';
import { Grid } from './Grid';
import { SolveTrace, Solver } from './Solver';
import { parseDifficulty } from './DifficultyBounds';

export interface SessionOptions {
    /** Difficulty of the first puzzle. Default: 'medium'. */
    difficulty?: Difficulty;
    /** Generator to draw puzzles from. Default: a new Generator built from `generatorOptions`. */
    generator?: Generator;
    generatorOptions?: GeneratorOptions;
    solver?: Solver;
    /**
     * Callback for trace logs execution details.
     */
    onTrace?: TraceFn;
}

/**
 * Result of checking the live grid.
 */
export interface CheckResult {
    /** Every cell is filled and no rule is broken. */
    solved: boolean;
    /** Player entries that repeat a digit in their row, column or box. */
    conflicts: Coord[];
    /** Player entries that differ from the puzzle's solution. */
    mistakes: Coord[];
}

const copyPuzzle = (puzzle: Puzzle): Puzzle => ({
    ...puzzle,
    grid: puzzle.grid.clone(),
    solution: puzzle.solution.clone(),
});

export type CommandResult =
    | { type: 'quit' }
    | { type: 'check'; result: CheckResult }
    | { type: 'solve'; trace: SolveTrace }
    | { type: 'reset' }
    | { type: 'new'; puzzle: Puzzle };

/**
 * One game: the active puzzle, the player's board and the current difficulty.
 *
 * A session starts with a freshly generated puzzle and ends with `quit`. Sessions share
 * nothing, so several can run side by side.
 */
export class GameSession {
    private generator: Generator;
    private solver: Solver;
    private puzzle: Puzzle;
    private board: Grid;
    private currentDifficulty: Difficulty;
    private active = true;
    private onTrace?: TraceFn;

    constructor(options: SessionOptions = {}) {
        this.onTrace = options.onTrace;
        this.generator = options.generator ?? new Generator({ onTrace: options.onTrace, ...options.generatorOptions });
        this.solver = options.solver ?? new Solver();
        this.currentDifficulty = parseDifficulty(options.difficulty ?? DEFAULT_DIFFICULTY);
        this.puzzle = this.generator.generate(this.currentDifficulty);
        this.board = this.puzzle.grid.clone();
        this.trace(`Session: Started ${this.currentDifficulty} game with ${this.puzzle.clueCount} clues.`);
    }

    public get difficulty(): Difficulty {
        return this.currentDifficulty;
    }

    public get isActive(): boolean {
        return this.active;
    }

    /**
     * A copy of the player's board. Change the board through `enter` and `clear`.
     */
    public get grid(): Grid {
        return this.board.clone();
    }

    /**
     * A copy of the active puzzle and its solution.
     */
    public get currentPuzzle(): Puzzle {
        return copyPuzzle(this.puzzle);
    }

    public get isSolved(): boolean {
        return this.board.isComplete();
    }

    /**
     * Replaces the puzzle with a new one. The old board is discarded.
     */
    public newGame(difficulty: Difficulty = this.currentDifficulty): Puzzle {
        this.assertActive();
        this.currentDifficulty = parseDifficulty(difficulty);
        this.puzzle = this.generator.generate(this.currentDifficulty);
        this.board = this.puzzle.grid.clone();
        this.trace(`Session: New ${this.currentDifficulty} game with ${this.puzzle.clueCount} clues.`);
        return copyPuzzle(this.puzzle);
    }

    /**
     * Writes a player digit.
     *
     * @throws {OutOfBoundsError}
     * @throws {InvalidDigitError}
     * @throws {CellLockedError} If the cell is a clue.
     */
    public enter(row: number, col: number, value: number): void {
        this.assertActive();
        this.board.set(row, col, value);
    }

    public clear(row: number, col: number): void {
        this.enter(row, col, 0);
    }

    /**
     * Validates the board against the rules and against the stored solution.
     * Only player entries are reported; clues are never flagged.
     */
    public check(): CheckResult {
        this.assertActive();
        const isEntry = ({ row, col }: Coord) => !this.board.isFixed(row, col);

        const conflicts = this.board.findErrors().filter(isEntry);
        const mistakes = this.board.cells()
            .filter(c => !c.fixed && c.value !== 0 && c.value !== this.puzzle.solution.get(c.row, c.col))
            .map(({ row, col }) => ({ row, col }));

        const result = { solved: this.board.isComplete(), conflicts, mistakes };
        this.trace(`Session: Check found ${conflicts.length} conflicts and ${mistakes.length} mistakes.`);
        return result;
    }

    /**
     * Solves from the current board, player entries included, and commits the result.
     *
     * @throws {UnsolvableError} If the entries leave no completion.
     */
    public solve(): Grid {
        this.assertActive();
        const solved = this.solver.solve(this.board);
        this.board = solved;
        this.trace('Session: Board solved.');
        return solved.clone();
    }

    /**
     * Starts an animated solve from the current board. Nothing changes until the final
     * grid is passed to `commit`.
     */
    public solveStepwise(): SolveTrace {
        this.assertActive();
        return this.solver.solveStepwise(this.board);
    }

    /**
     * Adopts a completed grid, e.g. the outcome of `solveStepwise`.
     *
     * @throws {ConfigurationError} If the grid is not complete or does not keep the puzzle's clues.
     */
    public commit(grid: Grid): void {
        this.assertActive();
        if (!grid.isComplete()) {
            throw new ConfigurationError('Only a completed grid can be committed.');
        }
        const keepsClues = this.puzzle.grid.cells().every(c => !c.fixed || grid.get(c.row, c.col) === c.value);
        if (!keepsClues) {
            throw new ConfigurationError('The grid does not match the puzzle clues.');
        }
        const next = this.puzzle.grid.clone();
        for (const c of grid.cells()) {
            if (!next.isFixed(c.row, c.col)) next.set(c.row, c.col, c.value);
        }
        this.board = next;
        this.trace('Session: Solution committed.');
    }

    /**
     * Clears every player entry, restoring the puzzle as generated.
     */
    public reset(): void {
        this.assertActive();
        this.board.clearEntries();
        this.trace('Session: Board reset.');
    }

    /**
     * Ends the session. Every later call except `quit` throws SessionClosedError.
     */
    public quit(): void {
        if (!this.active) return;
        this.active = false;
        this.trace('Session: Closed.');
    }

    /**
     * Runs a parsed command-bar command.
     */
    public execute(command: Command): CommandResult {
        switch (command.type) {
            case 'quit':
                this.quit();
                return { type: 'quit' };
            case 'check':
                return { type: 'check', result: this.check() };
            case 'solve':
                return { type: 'solve', trace: this.solveStepwise() };
            case 'reset':
                this.reset();
                return { type: 'reset' };
            case 'new':
                return { type: 'new', puzzle: this.newGame(command.difficulty) };
        }
    }

    private assertActive(): void {
        if (!this.active) throw new SessionClosedError();
    }

    private trace(message: string): void {
        if (this.onTrace) this.onTrace(message);
    }
}
