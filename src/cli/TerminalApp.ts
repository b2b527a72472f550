import { emitKeypressEvents } from 'node:readline';
import { setTimeout as sleep } from 'node:timers/promises';
import { Coord } from '../types';
import { SudokuError, TerminalTooSmallError } from '../errors';
import { DEFAULT_STEP_DELAY_MS } from '../defaults';
import { GameSession } from '../engine/GameSession';
import { SolveStep, SolveTrace } from '../engine/Solver';
import { parseCommand } from '../engine/Command';
import { KeyPress, mapKey, moveCursor } from './Keys';
import { BOARD_HEIGHT, BOARD_WIDTH, cellPosition, renderBoard } from './Renderer';

const HELP = 'arrows move  1-9 set  0 clear  : command  q quit';
const COMMAND_HELP = ':c check  :s solve  :r reset  :e/:m/:h new  :q quit';

// Title, blank line, board, blank line, status, command bar.
export const MIN_COLUMNS = Math.max(BOARD_WIDTH, HELP.length, COMMAND_HELP.length);
export const MIN_ROWS = BOARD_HEIGHT + 5;

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

/**
 * Where frames are drawn. `process.stdout` satisfies it.
 */
export interface Screen {
    readonly columns: number;
    readonly rows: number;
    write(data: string): void;
}

export interface TerminalAppOptions {
    /** Pause between two frames of the animated solve. Default: 20ms. */
    delayMs?: number;
    color?: boolean;
}

export type AppMode = 'board' | 'command' | 'animating';

/**
 * @throws {TerminalTooSmallError} If the screen cannot fit the game.
 */
export function assertFits(screen: Screen): void {
    if (screen.columns < MIN_COLUMNS || screen.rows < MIN_ROWS) {
        throw new TerminalTooSmallError(screen.columns, screen.rows, MIN_COLUMNS, MIN_ROWS);
    }
}

/**
 * Keyboard-driven front end for a GameSession.
 *
 * Keys move a cursor over the board and write digits; ':' opens a command bar.
 * `:solve` replays the backtracking search frame by frame until it ends or any key is pressed.
 */
export class TerminalApp {
    private mode: AppMode = 'board';
    private cursorAt: Coord = { row: 0, col: 0 };
    private commandText = '';
    private message = '';
    private errorCells: Coord[] = [];
    private frame: SolveStep | undefined;
    private abortRequested = false;
    private animation: Promise<void> | undefined;
    private delayMs: number;
    private color: boolean;
    private finish: ((error?: unknown) => void) | undefined;

    constructor(private readonly session: GameSession, private readonly screen: Screen, options: TerminalAppOptions = {}) {
        this.delayMs = Math.max(0, options.delayMs ?? DEFAULT_STEP_DELAY_MS);
        this.color = options.color ?? true;
    }

    public get cursor(): Coord {
        return this.cursorAt;
    }

    public get status(): string {
        return this.message;
    }

    public get inputMode(): AppMode {
        return this.mode;
    }

    public get commandBuffer(): string {
        return this.commandText;
    }

    /**
     * Resolves once the running solve animation, if any, has finished.
     */
    public async idle(): Promise<void> {
        if (this.animation) await this.animation;
    }

    /**
     * Attaches to a TTY input stream and runs until the session is closed.
     *
     * @param resizeSource - Stream whose 'resize' events trigger a redraw.
     */
    public run(input: NodeJS.ReadStream, resizeSource: NodeJS.WriteStream = process.stdout): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const onKeypress = (_str: string | undefined, key: KeyPress | undefined) => {
                this.handleKey(key ?? {});
            };
            const onResize = () => this.render();

            emitKeypressEvents(input);
            if (input.isTTY) input.setRawMode(true);
            input.on('keypress', onKeypress);
            resizeSource.on('resize', onResize);
            input.resume();

            this.finish = (error?: unknown) => {
                input.off('keypress', onKeypress);
                resizeSource.off('resize', onResize);
                if (input.isTTY) input.setRawMode(false);
                input.pause();
                this.screen.write(`${CLEAR_SCREEN}${SHOW_CURSOR}`);
                if (error === undefined) resolve();
                else reject(error);
            };

            this.render();
        });
    }

    /**
     * Handles one keypress and redraws the screen.
     */
    public handleKey(key: KeyPress): void {
        if (this.mode === 'animating') {
            if (key.ctrl && key.name === 'c') this.close();
            else this.abortRequested = true;
            return;
        }

        const action = mapKey(this.mode, key);
        switch (action.type) {
            case 'quit':
                this.close();
                return;
            case 'move':
                this.cursorAt = moveCursor(this.cursorAt, action.dRow, action.dCol);
                break;
            case 'enter':
                this.enterDigit(action.value);
                break;
            case 'openCommand':
                this.mode = 'command';
                this.commandText = '';
                this.message = COMMAND_HELP;
                break;
            case 'type':
                this.commandText += action.char;
                break;
            case 'erase':
                if (this.commandText.length === 0) {
                    this.mode = 'board';
                    this.message = '';
                }
                this.commandText = this.commandText.slice(0, -1);
                break;
            case 'cancel':
                this.mode = 'board';
                this.commandText = '';
                this.message = '';
                break;
            case 'submit':
                this.submitCommand();
                break;
            case 'none':
                return;
        }

        if (this.session.isActive) this.render();
    }

    private enterDigit(value: number): void {
        const { row, col } = this.cursorAt;
        this.guard(() => {
            this.session.enter(row, col, value);
            this.errorCells = this.errorCells.filter(c => c.row !== row || c.col !== col);
            this.message = this.session.isSolved ? 'Solved! Start a new game with :e, :m or :h.' : '';
        });
    }

    private submitCommand(): void {
        const text = this.commandText;
        this.mode = 'board';
        this.commandText = '';
        this.message = '';
        if (text.trim().length === 0) return;

        this.guard(() => {
            const result = this.session.execute(parseCommand(text));
            switch (result.type) {
                case 'quit':
                    this.close();
                    break;
                case 'check': {
                    const { solved, conflicts, mistakes } = result.result;
                    const wrong = [...conflicts, ...mistakes.filter(m => !conflicts.some(c => c.row === m.row && c.col === m.col))];
                    this.errorCells = wrong;
                    if (solved) this.message = 'Solved!';
                    else if (wrong.length === 0) this.message = 'No mistakes so far.';
                    else this.message = `${wrong.length} cell${wrong.length === 1 ? '' : 's'} wrong.`;
                    break;
                }
                case 'solve':
                    this.errorCells = [];
                    this.animation = this.animate(result.trace).catch(error => this.fail(error));
                    break;
                case 'reset':
                    this.errorCells = [];
                    this.message = 'Board reset.';
                    break;
                case 'new':
                    this.errorCells = [];
                    this.cursorAt = { row: 0, col: 0 };
                    this.message = `New ${result.puzzle.difficulty} puzzle with ${result.puzzle.clueCount} clues.`;
                    break;
            }
        });
    }

    private async animate(trace: SolveTrace): Promise<void> {
        this.mode = 'animating';
        this.abortRequested = false;
        this.message = 'Solving... press any key to stop.';

        for (const step of trace) {
            this.frame = step;
            this.render();
            await sleep(this.delayMs);
            if (this.abortRequested || !this.session.isActive) break;
        }

        this.frame = undefined;
        this.mode = 'board';
        if (!this.session.isActive) return;

        const outcome = trace.outcome;
        if (!outcome) {
            this.message = 'Solve stopped.';
        } else if (outcome.solved) {
            this.session.commit(outcome.grid);
            this.message = 'Solved.';
        } else {
            this.message = 'No solution from the current state.';
        }
        this.render();
    }

    /**
     * Runs an action, turning engine errors into a status message.
     */
    private guard(action: () => void): void {
        try {
            action();
        } catch (error) {
            if (!(error instanceof SudokuError)) throw error;
            this.message = error.message;
        }
    }

    private close(): void {
        this.session.quit();
        this.abortRequested = true;
        if (this.finish) this.finish();
    }

    private fail(error: unknown): void {
        this.mode = 'board';
        this.frame = undefined;
        if (error instanceof SudokuError && this.session.isActive) {
            this.message = error.message;
            this.render();
            return;
        }
        this.session.quit();
        if (this.finish) this.finish(error);
        else throw error;
    }

    /**
     * Draws the whole screen: title, board, status line and command bar, centred.
     */
    public render(): void {
        const { columns, rows } = this.screen;
        let out = `${CLEAR_SCREEN}${HIDE_CURSOR}`;

        try {
            assertFits(this.screen);
        } catch (error) {
            if (!(error instanceof TerminalTooSmallError)) throw error;
            this.screen.write(`${out}${error.message}`);
            return;
        }

        const grid = this.frame ? this.frame.grid : this.session.grid;
        const board = renderBoard(grid, {
            color: this.color,
            cursor: this.mode === 'animating' ? undefined : this.cursorAt,
            errors: this.errorCells,
            touched: this.frame ? { row: this.frame.row, col: this.frame.col } : undefined,
        });

        const title = `Sudoku (${this.session.difficulty})`;
        const bar = this.mode === 'command' ? `:${this.commandText}` : HELP;
        const lines = [title, '', ...board, '', this.message, bar];

        const top = Math.max(0, Math.floor((rows - lines.length) / 2));
        const left = Math.max(0, Math.floor((columns - BOARD_WIDTH) / 2));
        lines.forEach((line, i) => {
            out += `\x1b[${top + i + 1};${left + 1}H${line}`;
        });

        if (this.mode !== 'animating') {
            const cell = cellPosition(this.cursorAt.row, this.cursorAt.col);
            // The board starts two lines below the title.
            const pos = this.mode === 'command'
                ? { line: lines.length - 1, column: bar.length }
                : { line: cell.line + 2, column: cell.column };
            out += `\x1b[${top + pos.line + 1};${left + pos.column + 1}H${SHOW_CURSOR}`;
        }

        this.screen.write(out);
    }
}
