import { Coord } from '../types';
import { InvalidDigitError, OutOfBoundsError } from '../errors';

export const GRID_SIZE = 9;
export const BOX_SIZE = 3;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
export const DIGITS: readonly number[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/**
 * A unit is a row (0-8), a column (9-17) or a box (18-26).
 */
export const UNIT_COUNT = GRID_SIZE * 3;

export const boxIndex = (row: number, col: number): number =>
    Math.floor(row / BOX_SIZE) * BOX_SIZE + Math.floor(col / BOX_SIZE);

export const toIndex = (row: number, col: number): number => row * GRID_SIZE + col;

export const toCoord = (index: number): Coord => ({
    row: Math.floor(index / GRID_SIZE),
    col: index % GRID_SIZE,
});

/**
 * The three units a cell belongs to, as unit ids.
 */
export const unitsOf = (row: number, col: number): [number, number, number] => [
    row,
    GRID_SIZE + col,
    GRID_SIZE * 2 + boxIndex(row, col),
];

// Precomputed per cell index; the hot loops of the solver read this instead of recomputing.
export const CELL_UNITS: ReadonlyArray<readonly [number, number, number]> = Array.from(
    { length: CELL_COUNT },
    (_, i) => unitsOf(Math.floor(i / GRID_SIZE), i % GRID_SIZE),
);

export const isInBounds = (row: number, col: number): boolean =>
    Number.isInteger(row) && Number.isInteger(col) && row >= 0 && row < GRID_SIZE && col >= 0 && col < GRID_SIZE;

export const isCellValue = (value: number): boolean =>
    Number.isInteger(value) && value >= 0 && value <= GRID_SIZE;

export function assertInBounds(row: number, col: number): void {
    if (!isInBounds(row, col)) {
        throw new OutOfBoundsError(row, col);
    }
}

export function assertCellValue(value: number): void {
    if (!isCellValue(value)) {
        throw new InvalidDigitError(value);
    }
}
