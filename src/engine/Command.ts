import { Difficulty } from '../types';
import { UnknownCommandError } from '../errors';

/**
 * A command typed into the command bar.
 */
export type Command =
    | { type: 'quit' }
    | { type: 'check' }
    | { type: 'solve' }
    | { type: 'reset' }
    | { type: 'new'; difficulty: Difficulty };

const ALIASES: Record<string, Command> = {
    q: { type: 'quit' },
    quit: { type: 'quit' },
    c: { type: 'check' },
    check: { type: 'check' },
    s: { type: 'solve' },
    solve: { type: 'solve' },
    r: { type: 'reset' },
    reset: { type: 'reset' },
    e: { type: 'new', difficulty: 'easy' },
    easy: { type: 'new', difficulty: 'easy' },
    m: { type: 'new', difficulty: 'medium' },
    medium: { type: 'new', difficulty: 'medium' },
    h: { type: 'new', difficulty: 'hard' },
    hard: { type: 'new', difficulty: 'hard' },
};

/**
 * Parses command-bar text such as ':check' or 'e'. The leading colon is optional
 * and case is ignored.
 *
 * @throws {UnknownCommandError} If the text names no known command.
 */
export function parseCommand(input: string): Command {
    const word = input.trim().replace(/^:/, '').trim().toLowerCase();
    const command = Object.prototype.hasOwnProperty.call(ALIASES, word) ? ALIASES[word] : undefined;
    if (!command) {
        throw new UnknownCommandError(input.trim());
    }
    return { ...command };
}
