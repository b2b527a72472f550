import { Cell, CellValue, Coord } from '../types';
import { CellLockedError, ConfigurationError } from '../errors';
import { CELL_COUNT, CELL_UNITS, DIGITS, GRID_SIZE, UNIT_COUNT, assertCellValue, assertInBounds, toCoord, toIndex } from './Rules';

const SLOTS_PER_UNIT = GRID_SIZE + 1;

export interface GridParseOptions {
    /** Mark every given digit as a clue. Default: false. */
    lockClues?: boolean;
}

/**
 * Represents the state of a 9x9 Sudoku board.
 *
 * Each cell holds 0 (empty) or a digit, plus a flag marking it as a clue.
 * The grid keeps a count of every digit per row, column and box so that
 * placement checks do not have to scan the board.
 */
export class Grid {
    private values: number[];
    private fixed: boolean[];
    // counts[unit * 10 + digit]
    private counts: number[];

    /**
     * Creates an empty grid with no clues.
     */
    constructor() {
        this.values = Array(CELL_COUNT).fill(0);
        this.fixed = Array(CELL_COUNT).fill(false);
        this.counts = Array(UNIT_COUNT * SLOTS_PER_UNIT).fill(0);
    }

    /**
     * Builds a grid from nine rows of nine values.
     *
     * @throws {ConfigurationError} If the shape is not 9x9.
     * @throws {InvalidDigitError} If a value is not in 0..9.
     */
    public static fromRows(rows: readonly (readonly number[])[], options: GridParseOptions = {}): Grid {
        if (rows.length !== GRID_SIZE || rows.some(r => r.length !== GRID_SIZE)) {
            throw new ConfigurationError(`Expected ${GRID_SIZE} rows of ${GRID_SIZE} values.`);
        }
        const grid = new Grid();
        rows.forEach((values, row) => values.forEach((value, col) => grid.set(row, col, value)));
        if (options.lockClues) grid.lockClues();
        return grid;
    }

    /**
     * Parses the 81-character text form: digits 1-9, with '0' or '.' for an empty cell.
     * Whitespace is ignored, so the text may be laid out over several lines.
     *
     * @throws {ConfigurationError} On unexpected characters or a wrong length.
     */
    public static fromString(text: string, options: GridParseOptions = {}): Grid {
        const chars = text.replace(/\s+/g, '');
        if (chars.length !== CELL_COUNT) {
            throw new ConfigurationError(`Expected ${CELL_COUNT} cells, got ${chars.length}.`);
        }
        const grid = new Grid();
        for (let i = 0; i < CELL_COUNT; i++) {
            const ch = chars[i];
            if (ch === '.' || ch === '0') continue;
            if (ch < '1' || ch > '9') {
                throw new ConfigurationError(`Unexpected character '${ch}' at position ${i}.`);
            }
            grid.write(i, Number(ch));
        }
        if (options.lockClues) grid.lockClues();
        return grid;
    }

    /**
     * @throws {OutOfBoundsError} If row or col is outside 0..8.
     */
    public get(row: number, col: number): CellValue {
        assertInBounds(row, col);
        return this.values[toIndex(row, col)];
    }

    /**
     * Writes a value into a cell. Writing 0 clears it.
     *
     * @throws {OutOfBoundsError} If row or col is outside 0..8.
     * @throws {InvalidDigitError} If the value is not an integer in 0..9.
     * @throws {CellLockedError} If the cell is a clue.
     */
    public set(row: number, col: number, value: CellValue): void {
        assertInBounds(row, col);
        assertCellValue(value);
        const index = toIndex(row, col);
        if (this.fixed[index]) {
            throw new CellLockedError(row, col);
        }
        this.write(index, value);
    }

    public isFixed(row: number, col: number): boolean {
        assertInBounds(row, col);
        return this.fixed[toIndex(row, col)];
    }

    public cell(row: number, col: number): Cell {
        assertInBounds(row, col);
        const index = toIndex(row, col);
        return { row, col, value: this.values[index], fixed: this.fixed[index] };
    }

    /**
     * All 81 cells in row-major order.
     */
    public cells(): Cell[] {
        return this.values.map((value, index) => ({ ...toCoord(index), value, fixed: this.fixed[index] }));
    }

    /**
     * Checks whether `value` could go into the cell without repeating a digit
     * held by another cell of the same row, column or box.
     * The cell's own current value is ignored, and 0 is always legal.
     */
    public isLegalPlacement(row: number, col: number, value: CellValue): boolean {
        assertInBounds(row, col);
        assertCellValue(value);
        if (value === 0) return true;
        const index = toIndex(row, col);
        const own = this.values[index] === value ? 1 : 0;
        for (const unit of CELL_UNITS[index]) {
            if (this.counts[unit * SLOTS_PER_UNIT + value] - own > 0) return false;
        }
        return true;
    }

    /**
     * True when every cell is filled and every row, column and box holds 1-9 exactly once.
     */
    public isComplete(): boolean {
        if (this.values.includes(0)) return false;
        for (let unit = 0; unit < UNIT_COUNT; unit++) {
            for (const digit of DIGITS) {
                if (this.counts[unit * SLOTS_PER_UNIT + digit] !== 1) return false;
            }
        }
        return true;
    }

    /**
     * Finds every filled cell whose digit also appears elsewhere in its row, column or box.
     * Empty cells are never reported, so this is safe on partial grids.
     *
     * @returns The conflicting cells in row-major order, each listed once.
     */
    public findErrors(): Coord[] {
        const errors: Coord[] = [];
        this.values.forEach((value, index) => {
            if (value === 0) return;
            if (CELL_UNITS[index].some(unit => this.counts[unit * SLOTS_PER_UNIT + value] > 1)) {
                errors.push(toCoord(index));
            }
        });
        return errors;
    }

    public emptyCount(): number {
        return this.values.filter(v => v === 0).length;
    }

    /**
     * Number of filled cells, whether clues or player entries.
     */
    public filledCount(): number {
        return CELL_COUNT - this.emptyCount();
    }

    public clueCount(): number {
        return this.fixed.filter(f => f).length;
    }

    /**
     * Marks every filled cell as a clue.
     */
    public lockClues(): void {
        this.fixed = this.values.map(v => v !== 0);
    }

    /**
     * Empties every cell that is not a clue.
     */
    public clearEntries(): void {
        for (let i = 0; i < CELL_COUNT; i++) {
            if (!this.fixed[i]) this.write(i, 0);
        }
    }

    /**
     * Compares digits only; clue flags are ignored.
     */
    public equals(other: Grid): boolean {
        return this.values.every((v, i) => v === other.values[i]);
    }

    public toRows(): number[][] {
        return Array.from({ length: GRID_SIZE }, (_, row) => this.values.slice(row * GRID_SIZE, (row + 1) * GRID_SIZE));
    }

    /**
     * The 81-character text form, with '.' for empty cells.
     */
    public toString(): string {
        return this.values.map(v => (v === 0 ? '.' : String(v))).join('');
    }

    /**
     * Creates a deep copy of the current Grid.
     *
     * @returns A new Grid instance with the same digits and clue flags.
     */
    public clone(): Grid {
        const copy = new Grid();
        copy.values = [...this.values];
        copy.fixed = [...this.fixed];
        copy.counts = [...this.counts];
        return copy;
    }

    private write(index: number, value: number): void {
        const previous = this.values[index];
        if (previous === value) return;
        const units = CELL_UNITS[index];
        if (previous !== 0) {
            for (const unit of units) this.counts[unit * SLOTS_PER_UNIT + previous]--;
        }
        if (value !== 0) {
            for (const unit of units) this.counts[unit * SLOTS_PER_UNIT + value]++;
        }
        this.values[index] = value;
    }
}
