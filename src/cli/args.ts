import { parseArgs } from 'node:util';
import { Difficulty } from '../types';
import { ConfigurationError } from '../errors';
import { DEFAULT_DIFFICULTY, DEFAULT_STEP_DELAY_MS } from '../defaults';
import { parseDifficulty } from '../engine/DifficultyBounds';

export const USAGE = `Usage: sudoku [easy|medium|hard] [options]

Options:
  --seed <n>     Generate reproducible puzzles from an integer seed
  --delay <ms>   Pause between frames of the animated solve (default ${DEFAULT_STEP_DELAY_MS})
  --no-color     Draw the board without ANSI colours
  -v, --verbose  Write generator and session traces to stderr
  -h, --help     Show this help`;

export interface CliOptions {
    difficulty: Difficulty;
    seed?: number;
    delayMs: number;
    color: boolean;
    verbose: boolean;
    help: boolean;
}

const parseInteger = (name: string, raw: string, min: number): number => {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigurationError(`--${name} expects a whole number of at least ${min}, got '${raw}'.`);
    }
    return value;
};

const readArgs = (argv: string[]) => {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            strict: true,
            options: {
                seed: { type: 'string' },
                delay: { type: 'string' },
                'no-color': { type: 'boolean', default: false },
                verbose: { type: 'boolean', short: 'v', default: false },
                help: { type: 'boolean', short: 'h', default: false },
            },
        });
    } catch (error) {
        throw new ConfigurationError(error instanceof Error ? error.message : String(error));
    }
};

/**
 * Parses the process arguments (without the node and script paths).
 *
 * @throws {ConfigurationError} On unknown options, a bad value or more than one difficulty.
 */
export function parseCliArgs(argv: string[]): CliOptions {
    const { values, positionals } = readArgs(argv);
    if (positionals.length > 1) {
        throw new ConfigurationError(`Expected at most one difficulty, got: ${positionals.join(' ')}.`);
    }

    return {
        difficulty: positionals.length === 1 ? parseDifficulty(positionals[0]) : DEFAULT_DIFFICULTY,
        seed: values.seed !== undefined ? parseInteger('seed', values.seed, Number.MIN_SAFE_INTEGER) : undefined,
        delayMs: values.delay !== undefined ? parseInteger('delay', values.delay, 0) : DEFAULT_STEP_DELAY_MS,
        color: !values['no-color'],
        verbose: values.verbose === true,
        help: values.help === true,
    };
}
