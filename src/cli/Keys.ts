import { Coord } from '../types';
import { GRID_SIZE } from '../engine/Rules';

/**
 * The subset of a readline keypress event the game looks at.
 */
export interface KeyPress {
    name?: string;
    sequence?: string;
    ctrl?: boolean;
}

export type InputMode = 'board' | 'command';

export type KeyAction =
    | { type: 'move'; dRow: number; dCol: number }
    | { type: 'enter'; value: number }
    | { type: 'openCommand' }
    | { type: 'quit' }
    | { type: 'type'; char: string }
    | { type: 'erase' }
    | { type: 'submit' }
    | { type: 'cancel' }
    | { type: 'none' };

const MOVES: Record<string, { dRow: number; dCol: number }> = {
    up: { dRow: -1, dCol: 0 },
    down: { dRow: 1, dCol: 0 },
    left: { dRow: 0, dCol: -1 },
    right: { dRow: 0, dCol: 1 },
};

const CLEAR_KEYS = ['backspace', 'delete', 'space'];

/**
 * Maps a keypress to a game action for the given input mode.
 */
export function mapKey(mode: InputMode, key: KeyPress): KeyAction {
    if (key.ctrl && key.name === 'c') return { type: 'quit' };
    const char = key.sequence ?? '';

    if (mode === 'command') {
        if (key.name === 'return' || key.name === 'enter') return { type: 'submit' };
        if (key.name === 'escape') return { type: 'cancel' };
        if (key.name === 'backspace') return { type: 'erase' };
        if (char.length === 1 && char >= ' ' && char <= '~') return { type: 'type', char };
        return { type: 'none' };
    }

    const move = key.name !== undefined ? MOVES[key.name] : undefined;
    if (move) return { type: 'move', ...move };
    if (char.length === 1 && char >= '0' && char <= '9') return { type: 'enter', value: Number(char) };
    if (key.name !== undefined && CLEAR_KEYS.includes(key.name)) return { type: 'enter', value: 0 };
    if (char === ':') return { type: 'openCommand' };
    if (char === 'q') return { type: 'quit' };
    return { type: 'none' };
}

/**
 * Moves the cursor, wrapping around the edges of the board.
 */
export function moveCursor(cursor: Coord, dRow: number, dCol: number): Coord {
    const wrap = (n: number) => ((n % GRID_SIZE) + GRID_SIZE) % GRID_SIZE;
    return { row: wrap(cursor.row + dRow), col: wrap(cursor.col + dCol) };
}
