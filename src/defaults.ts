import { Difficulty } from './types';

/**
 * Difficulty used when none is given on the command line.
 */
export const DEFAULT_DIFFICULTY: Difficulty = 'medium';

/**
 * Pause between two frames of the animated solve, in milliseconds.
 */
export const DEFAULT_STEP_DELAY_MS = 20;

/**
 * How many times the generator restarts a failed fill before giving up.
 */
export const DEFAULT_MAX_FILL_ATTEMPTS = 5;
