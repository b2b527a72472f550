import { Coord } from '../types';
import { Grid } from '../engine/Grid';
import { BOX_SIZE, GRID_SIZE } from '../engine/Rules';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const INVERSE = '\x1b[7m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

const BORDER = '+-------+-------+-------+';

export const BOARD_WIDTH = BORDER.length;
export const BOARD_HEIGHT = GRID_SIZE + BOX_SIZE + 1;

export interface BoardStyle {
    /** Emit ANSI colours. Without them the board is plain ASCII. */
    color?: boolean;
    cursor?: Coord;
    /** Cells to mark as wrong. */
    errors?: readonly Coord[];
    /** Cell changed by the latest solver step. */
    touched?: Coord;
}

const sameCell = (a: Coord | undefined, row: number, col: number): boolean =>
    a !== undefined && a.row === row && a.col === col;

/**
 * Renders the board as 13 lines of 25 characters (plus escape codes when colour is on).
 *
 * ```
 * +-------+-------+-------+
 * | 5 3 . | . 7 . | . . . |
 * ```
 */
export function renderBoard(grid: Grid, style: BoardStyle = {}): string[] {
    const lines: string[] = [BORDER];
    const errors = style.errors ?? [];

    for (let row = 0; row < GRID_SIZE; row++) {
        let line = '|';
        for (let col = 0; col < GRID_SIZE; col++) {
            const { value, fixed } = grid.cell(row, col);
            let text = value === 0 ? '.' : String(value);

            if (style.color) {
                const codes: string[] = [];
                if (fixed) codes.push(BOLD);
                else if (value !== 0) codes.push(CYAN);
                if (errors.some(e => e.row === row && e.col === col)) codes.push(RED);
                if (sameCell(style.touched, row, col)) codes.push(YELLOW);
                if (sameCell(style.cursor, row, col)) codes.push(INVERSE);
                if (codes.length > 0) text = `${codes.join('')}${text}${RESET}`;
            }

            line += ` ${text}`;
            if ((col + 1) % BOX_SIZE === 0) line += ' |';
        }
        lines.push(line);
        if ((row + 1) % BOX_SIZE === 0) lines.push(BORDER);
    }

    return lines;
}

/**
 * Where a cell's digit sits inside the rendered board, as zero-based line and column.
 */
export function cellPosition(row: number, col: number): { line: number; column: number } {
    return {
        line: 1 + row + Math.floor(row / BOX_SIZE),
        column: 2 + col * 2 + Math.floor(col / BOX_SIZE) * 2,
    };
}
