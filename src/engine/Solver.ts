import { CellValue } from '../types';
import { UnsolvableError } from '../errors';
import { Grid } from './Grid';
import { CELL_COUNT, DIGITS, toCoord } from './Rules';

/**
 * Supplies the order in which digits are tried for a cell.
 * Must return a fresh array on every call.
 */
export type DigitOrder = () => number[];

export const ASCENDING: DigitOrder = () => [...DIGITS];

export type StepKind = 'place' | 'retract';

/**
 * One observable move of the backtracking search.
 */
export interface SolveStep {
    kind: StepKind;
    row: number;
    col: number;
    oldValue: CellValue;
    newValue: CellValue;
    /** Snapshot of the board right after this step. Safe to keep. */
    grid: Grid;
}

/**
 * Final result of a search.
 */
export type SolveOutcome =
    | { solved: true; grid: Grid }
    | { solved: false };

/**
 * What a single call to `BacktrackingSearch.advance` did.
 */
export type SearchEvent =
    | { type: 'place'; index: number; value: number }
    | { type: 'retract'; index: number; value: number }
    | { type: 'solved' }
    | { type: 'exhausted' };

interface Frame {
    index: number;
    digits: number[];
    next: number;
}

/**
 * Depth-first search over the empty cells of a grid, kept as an explicit stack of frames
 * so that it can be paused after any single placement or retraction.
 *
 * Cells are visited in row-major order. The search owns and mutates the grid it is given;
 * callers pass a clone.
 */
export class BacktrackingSearch {
    private frames: Frame[] = [];
    private seeking = true;
    private state: 'running' | 'solved' | 'exhausted' = 'running';

    constructor(private readonly grid: Grid, private readonly order: DigitOrder = ASCENDING) {
        // Clues that already clash can never be completed.
        if (grid.findErrors().length > 0) {
            this.state = 'exhausted';
        }
    }

    public get board(): Grid {
        return this.grid;
    }

    public get isDone(): boolean {
        return this.state !== 'running';
    }

    /**
     * Performs exactly one placement or retraction, or reports that the search has ended.
     */
    public advance(): SearchEvent {
        if (this.state === 'solved') return { type: 'solved' };
        if (this.state === 'exhausted') return { type: 'exhausted' };

        if (this.seeking) {
            const index = this.nextEmpty();
            if (index === -1) {
                this.state = 'solved';
                return { type: 'solved' };
            }
            this.frames.push({ index, digits: this.order(), next: 0 });
            this.seeking = false;
        }

        const top = this.frames[this.frames.length - 1];
        const { row, col } = toCoord(top.index);
        while (top.next < top.digits.length) {
            const digit = top.digits[top.next++];
            if (this.grid.isLegalPlacement(row, col, digit)) {
                this.grid.set(row, col, digit);
                this.seeking = true;
                return { type: 'place', index: top.index, value: digit };
            }
        }

        // Every digit failed here: drop the frame and undo the previous placement.
        this.frames.pop();
        return this.retractTop();
    }

    /**
     * Treats the current solution as a dead end and continues the search from it,
     * so that further solutions can be enumerated.
     */
    public rejectSolution(): SearchEvent {
        if (this.state !== 'solved') return this.advance();
        this.state = 'running';
        return this.retractTop();
    }

    private retractTop(): SearchEvent {
        const parent = this.frames[this.frames.length - 1];
        if (!parent) {
            this.state = 'exhausted';
            return { type: 'exhausted' };
        }
        const { row, col } = toCoord(parent.index);
        const value = this.grid.get(row, col);
        this.grid.set(row, col, 0);
        this.seeking = false;
        return { type: 'retract', index: parent.index, value };
    }

    private nextEmpty(): number {
        // Cells before the deepest frame are all filled, so the scan can start there.
        const start = this.frames.length > 0 ? this.frames[this.frames.length - 1].index + 1 : 0;
        for (let i = start; i < CELL_COUNT; i++) {
            const { row, col } = toCoord(i);
            if (this.grid.get(row, col) === 0) return i;
        }
        return -1;
    }
}

/**
 * Lazy sequence of the steps a stepwise solve performs.
 *
 * Pulling the next step resumes the search exactly where it stopped; nothing runs in
 * between. Once the steps are exhausted the iterator returns the `SolveOutcome` as its
 * final value, which is also available from `outcome`.
 */
export class SolveTrace implements IterableIterator<SolveStep> {
    private search: BacktrackingSearch;
    private result: SolveOutcome | undefined;

    constructor(grid: Grid) {
        this.search = new BacktrackingSearch(grid.clone());
    }

    /**
     * The final result, or undefined while the search is still running.
     */
    public get outcome(): SolveOutcome | undefined {
        return this.result;
    }

    public next(): IteratorResult<SolveStep, SolveOutcome> {
        if (this.result) return { done: true, value: this.result };

        const event = this.search.advance();
        switch (event.type) {
            case 'solved':
                this.result = { solved: true, grid: this.search.board.clone() };
                return { done: true, value: this.result };
            case 'exhausted':
                this.result = { solved: false };
                return { done: true, value: this.result };
            case 'place':
            case 'retract': {
                const { row, col } = toCoord(event.index);
                const step: SolveStep = {
                    kind: event.type,
                    row,
                    col,
                    oldValue: event.type === 'place' ? 0 : event.value,
                    newValue: event.type === 'place' ? event.value : 0,
                    grid: this.search.board.clone(),
                };
                return { done: false, value: step };
            }
        }
    }

    /**
     * Runs the remaining steps without producing snapshots and returns the outcome.
     */
    public finish(): SolveOutcome {
        let step = this.next();
        while (!step.done) step = this.next();
        return step.value;
    }

    [Symbol.iterator](): SolveTrace {
        return this;
    }
}

/**
 * Backtracking Sudoku solver.
 *
 * Every entry point works on a copy: the caller's grid is never modified.
 */
export class Solver {

    /**
     * Solves the grid, trying digits in ascending order.
     *
     * @returns A new, completed grid. Clue flags are carried over.
     * @throws {UnsolvableError} If no completion exists.
     */
    public solve(grid: Grid): Grid {
        const outcome = this.trySolve(grid);
        if (!outcome.solved) {
            throw new UnsolvableError();
        }
        return outcome.grid;
    }

    /**
     * Same as `solve`, but reports failure as a value instead of throwing.
     */
    public trySolve(grid: Grid, order: DigitOrder = ASCENDING): SolveOutcome {
        const search = new BacktrackingSearch(grid.clone(), order);
        let event = search.advance();
        while (event.type === 'place' || event.type === 'retract') {
            event = search.advance();
        }
        return event.type === 'solved' ? { solved: true, grid: search.board } : { solved: false };
    }

    /**
     * Starts a stepwise solve. The search advances only as the trace is consumed.
     */
    public solveStepwise(grid: Grid): SolveTrace {
        return new SolveTrace(grid);
    }

    /**
     * Counts completions of the grid, stopping as soon as `limit` have been found.
     *
     * @param limit - Upper bound on the count. With the default of 2, the result tells
     *  "no solution" (0), "unique" (1) and "several" (2) apart.
     */
    public countSolutions(grid: Grid, limit: number = 2): number {
        if (limit < 1) return 0;
        const search = new BacktrackingSearch(grid.clone());
        let found = 0;
        let event = search.advance();
        while (event.type !== 'exhausted') {
            if (event.type === 'solved') {
                found++;
                if (found >= limit) break;
                event = search.rejectSolution();
            } else {
                event = search.advance();
            }
        }
        return found;
    }
}
