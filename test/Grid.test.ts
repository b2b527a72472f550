import { Grid } from '../src/engine/Grid';
import { CellLockedError, ConfigurationError, InvalidDigitError, OutOfBoundsError } from '../src/errors';
import { FIVE_BLANKS, SOLVED } from './fixtures';

describe('Grid', () => {

    describe('get / set', () => {
        it('should start empty', () => {
            const grid = new Grid();
            expect(grid.get(4, 4)).toBe(0);
            expect(grid.emptyCount()).toBe(81);
        });

        it('should store and clear a digit', () => {
            const grid = new Grid();
            grid.set(2, 7, 6);
            expect(grid.get(2, 7)).toBe(6);
            grid.set(2, 7, 0);
            expect(grid.get(2, 7)).toBe(0);
        });

        it('should reject coordinates outside the board', () => {
            const grid = new Grid();
            expect(() => grid.set(9, 0, 1)).toThrow(OutOfBoundsError);
            expect(() => grid.get(0, -1)).toThrow(OutOfBoundsError);
            expect(() => grid.get(1.5, 0)).toThrow(OutOfBoundsError);
        });

        it('should reject values outside 0-9', () => {
            const grid = new Grid();
            expect(() => grid.set(0, 0, 10)).toThrow(InvalidDigitError);
            expect(() => grid.set(0, 0, -1)).toThrow(InvalidDigitError);
            expect(() => grid.set(0, 0, 2.5)).toThrow(InvalidDigitError);
        });

        it('should refuse to overwrite a clue', () => {
            const grid = Grid.fromString(FIVE_BLANKS, { lockClues: true });
            expect(() => grid.set(0, 0, 5)).toThrow(CellLockedError);
            expect(() => grid.set(0, 0, 0)).toThrow('Cell (0, 0) is a clue and cannot be changed.');
            expect(grid.get(0, 0)).toBe(1);
        });

        it('should still accept writes to empty cells of a locked puzzle', () => {
            const grid = Grid.fromString(FIVE_BLANKS, { lockClues: true });
            grid.set(1, 3, 7);
            expect(grid.get(1, 3)).toBe(7);
            expect(grid.isFixed(1, 3)).toBe(false);
        });
    });

    describe('isLegalPlacement', () => {
        it('should reject a digit already present in the row', () => {
            const grid = new Grid();
            grid.set(3, 8, 4);
            expect(grid.isLegalPlacement(3, 0, 4)).toBe(false);
            expect(grid.isLegalPlacement(3, 0, 5)).toBe(true);
        });

        it('should reject a digit already present in the column or box', () => {
            const grid = new Grid();
            grid.set(8, 2, 9);
            grid.set(1, 1, 3);
            expect(grid.isLegalPlacement(0, 2, 9)).toBe(false);
            expect(grid.isLegalPlacement(0, 0, 3)).toBe(false);
            expect(grid.isLegalPlacement(0, 3, 3)).toBe(true);
        });

        it('should always accept 0', () => {
            const grid = Grid.fromString(SOLVED);
            expect(grid.isLegalPlacement(0, 0, 0)).toBe(true);
        });

        it('should ignore the value already in the cell itself', () => {
            const grid = Grid.fromString(SOLVED);
            expect(grid.isLegalPlacement(0, 0, 1)).toBe(true);
            expect(grid.isLegalPlacement(0, 0, 2)).toBe(false);
        });
    });

    describe('isComplete / findErrors', () => {
        it('should accept a valid solved board', () => {
            const grid = Grid.fromString(SOLVED);
            expect(grid.isComplete()).toBe(true);
            expect(grid.findErrors()).toEqual([]);
        });

        it('should report both cells of a duplicate on a partial board', () => {
            const grid = new Grid();
            grid.set(0, 0, 5);
            grid.set(0, 1, 5);
            expect(grid.findErrors()).toEqual([{ row: 0, col: 0 }, { row: 0, col: 1 }]);
            expect(grid.isComplete()).toBe(false);
        });

        it('should report duplicates on a full but wrong board', () => {
            const grid = Grid.fromString(SOLVED);
            // Swap the first two digits of row 0: each now clashes within its column.
            grid.set(0, 0, 2);
            grid.set(0, 1, 1);
            expect(grid.isComplete()).toBe(false);
            expect(grid.findErrors()).toEqual([
                { row: 0, col: 0 },
                { row: 0, col: 1 },
                { row: 3, col: 0 },
                { row: 8, col: 1 },
            ]);
        });

        it('should not be complete while any cell is empty', () => {
            const grid = Grid.fromString(FIVE_BLANKS);
            expect(grid.findErrors()).toEqual([]);
            expect(grid.isComplete()).toBe(false);
        });
    });

    describe('clone', () => {
        it('should leave the original untouched when the copy changes', () => {
            const grid = Grid.fromString(FIVE_BLANKS, { lockClues: true });
            const copy = grid.clone();
            copy.set(1, 3, 7);
            expect(grid.get(1, 3)).toBe(0);
            expect(copy.get(1, 3)).toBe(7);
            expect(copy.isFixed(0, 0)).toBe(true);
        });

        it('should keep digit counts separate', () => {
            const grid = new Grid();
            const copy = grid.clone();
            copy.set(0, 0, 5);
            expect(grid.isLegalPlacement(0, 8, 5)).toBe(true);
            expect(copy.isLegalPlacement(0, 8, 5)).toBe(false);
        });
    });

    describe('text form', () => {
        it('should round-trip through toString', () => {
            const grid = Grid.fromString(FIVE_BLANKS);
            expect(grid.toString()).toBe(FIVE_BLANKS);
        });

        it('should accept zeros and whitespace', () => {
            const grid = Grid.fromString(`${'0'.repeat(40)}\n5\n${'0'.repeat(40)}`);
            expect(grid.get(4, 4)).toBe(5);
            expect(grid.filledCount()).toBe(1);
        });

        it('should reject a wrong length or stray characters', () => {
            expect(() => Grid.fromString('123')).toThrow(ConfigurationError);
            expect(() => Grid.fromString(`x${'.'.repeat(80)}`)).toThrow("Unexpected character 'x' at position 0.");
        });

        it('should build from rows', () => {
            const rows = Grid.fromString(SOLVED).toRows();
            expect(rows[1]).toEqual([4, 5, 6, 7, 8, 9, 1, 2, 3]);
            expect(Grid.fromRows(rows).equals(Grid.fromString(SOLVED))).toBe(true);
            expect(() => Grid.fromRows(rows.slice(1))).toThrow(ConfigurationError);
        });
    });

    describe('clues', () => {
        it('should lock every filled cell', () => {
            const grid = Grid.fromString(FIVE_BLANKS);
            expect(grid.clueCount()).toBe(0);
            grid.lockClues();
            expect(grid.clueCount()).toBe(76);
            expect(grid.cell(1, 3)).toEqual({ row: 1, col: 3, value: 0, fixed: false });
            expect(grid.cell(1, 4)).toEqual({ row: 1, col: 4, value: 8, fixed: true });
        });

        it('should clear only player entries', () => {
            const grid = Grid.fromString(FIVE_BLANKS, { lockClues: true });
            grid.set(1, 3, 7);
            grid.set(7, 1, 7);
            grid.clearEntries();
            expect(grid.toString()).toBe(FIVE_BLANKS);
        });
    });
});
