#!/usr/bin/env node
import { SudokuError } from '../errors';
import { GameSession } from '../engine/GameSession';
import { CliOptions, USAGE, parseCliArgs } from './args';
import { TerminalApp, assertFits } from './TerminalApp';

async function main(argv: string[]): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        if (!(error instanceof SudokuError)) throw error;
        console.error(`${error.message}\n\n${USAGE}`);
        return 2;
    }

    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    if (!process.stdin.isTTY || !process.stdout.isTTY) {
        console.error('sudoku needs an interactive terminal.');
        return 1;
    }

    try {
        assertFits(process.stdout);
    } catch (error) {
        if (!(error instanceof SudokuError)) throw error;
        console.error(error.message);
        return 1;
    }

    const onTrace = options.verbose ? (message: string) => console.error(message) : undefined;
    const session = new GameSession({
        difficulty: options.difficulty,
        generatorOptions: { seed: options.seed },
        onTrace,
    });

    const app = new TerminalApp(session, process.stdout, { delayMs: options.delayMs, color: options.color });
    await app.run(process.stdin);
    return 0;
}

main(process.argv.slice(2)).then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error instanceof Error ? error.message : error);
        process.exitCode = 1;
    },
);
