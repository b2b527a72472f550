import { mapKey, moveCursor } from '../src/cli/Keys';

describe('Keys', () => {
    describe('board mode', () => {
        it('should map arrow keys to moves', () => {
            expect(mapKey('board', { name: 'up' })).toEqual({ type: 'move', dRow: -1, dCol: 0 });
            expect(mapKey('board', { name: 'right' })).toEqual({ type: 'move', dRow: 0, dCol: 1 });
        });

        it('should map digits and clearing keys to entries', () => {
            expect(mapKey('board', { name: '7', sequence: '7' })).toEqual({ type: 'enter', value: 7 });
            expect(mapKey('board', { name: '0', sequence: '0' })).toEqual({ type: 'enter', value: 0 });
            expect(mapKey('board', { name: 'backspace', sequence: '\x7f' })).toEqual({ type: 'enter', value: 0 });
            expect(mapKey('board', { name: 'space', sequence: ' ' })).toEqual({ type: 'enter', value: 0 });
        });

        it('should open the command bar on a colon and quit on q', () => {
            expect(mapKey('board', { sequence: ':' })).toEqual({ type: 'openCommand' });
            expect(mapKey('board', { name: 'q', sequence: 'q' })).toEqual({ type: 'quit' });
            expect(mapKey('board', { name: 'c', sequence: '\x03', ctrl: true })).toEqual({ type: 'quit' });
        });

        it('should ignore anything else', () => {
            expect(mapKey('board', { name: 'x', sequence: 'x' })).toEqual({ type: 'none' });
            expect(mapKey('board', {})).toEqual({ type: 'none' });
        });
    });

    describe('command mode', () => {
        it('should collect printable characters', () => {
            expect(mapKey('command', { name: 'q', sequence: 'q' })).toEqual({ type: 'type', char: 'q' });
            expect(mapKey('command', { name: '5', sequence: '5' })).toEqual({ type: 'type', char: '5' });
        });

        it('should map editing keys', () => {
            expect(mapKey('command', { name: 'return', sequence: '\r' })).toEqual({ type: 'submit' });
            expect(mapKey('command', { name: 'escape', sequence: '\x1b' })).toEqual({ type: 'cancel' });
            expect(mapKey('command', { name: 'backspace', sequence: '\x7f' })).toEqual({ type: 'erase' });
            expect(mapKey('command', { name: 'up', sequence: '\x1b[A' })).toEqual({ type: 'none' });
        });
    });

    describe('moveCursor', () => {
        it('should move within the board', () => {
            expect(moveCursor({ row: 4, col: 4 }, 1, -1)).toEqual({ row: 5, col: 3 });
        });

        it('should wrap around every edge', () => {
            expect(moveCursor({ row: 0, col: 0 }, -1, 0)).toEqual({ row: 8, col: 0 });
            expect(moveCursor({ row: 0, col: 0 }, 0, -1)).toEqual({ row: 0, col: 8 });
            expect(moveCursor({ row: 8, col: 8 }, 1, 1)).toEqual({ row: 0, col: 0 });
        });
    });
});
