/**
 * Base error class for the Sudoku engine and its terminal front end.
 */
export class SudokuError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SudokuError';
    }
}

/**
 * Thrown when a row or column index lies outside 0..8.
 */
export class OutOfBoundsError extends SudokuError {
    constructor(public readonly row: number, public readonly col: number) {
        super(`Cell (${row}, ${col}) is outside the 9x9 grid.`);
        this.name = 'OutOfBoundsError';
    }
}

/**
 * Thrown when a value is not an integer digit in 0..9.
 */
export class InvalidDigitError extends SudokuError {
    constructor(public readonly value: number) {
        super(`Invalid digit: ${value}. Expected an integer from 0 to 9.`);
        this.name = 'InvalidDigitError';
    }
}

/**
 * Thrown on a write to a clue cell.
 */
export class CellLockedError extends SudokuError {
    constructor(public readonly row: number, public readonly col: number) {
        super(`Cell (${row}, ${col}) is a clue and cannot be changed.`);
        this.name = 'CellLockedError';
    }
}

/**
 * Thrown when the search exhausts every branch without completing the grid.
 * This is an expected outcome for contradictory boards, not an internal fault.
 */
export class UnsolvableError extends SudokuError {
    constructor(message: string = 'No solution exists from the current state.') {
        super(message);
        this.name = 'UnsolvableError';
    }
}

/**
 * Thrown when the provided configuration is invalid (e.g., unknown difficulty, overlapping clue ranges).
 */
export class ConfigurationError extends SudokuError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when command-bar text names no known command.
 */
export class UnknownCommandError extends SudokuError {
    constructor(public readonly input: string) {
        super(`Unknown command '${input}'. Try :q, :c, :s, :r, :e, :m or :h.`);
        this.name = 'UnknownCommandError';
    }
}

/**
 * Thrown when a session is used after it has been closed.
 */
export class SessionClosedError extends SudokuError {
    constructor() {
        super('The game session has ended.');
        this.name = 'SessionClosedError';
    }
}

/**
 * Thrown when the generator cannot build a solved grid within its retry budget.
 */
export class GenerationError extends SudokuError {
    constructor(message: string) {
        super(message);
        this.name = 'GenerationError';
    }
}

/**
 * Thrown when the terminal window cannot fit the board.
 */
export class TerminalTooSmallError extends SudokuError {
    constructor(
        public readonly columns: number,
        public readonly rows: number,
        public readonly minColumns: number,
        public readonly minRows: number,
    ) {
        super(`Terminal is too small (${columns}x${rows}). Resize it to at least ${minColumns}x${minRows}.`);
        this.name = 'TerminalTooSmallError';
    }
}
