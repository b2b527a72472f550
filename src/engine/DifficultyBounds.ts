import { ClueRange, ClueTargets, DIFFICULTIES, Difficulty, RandomSource } from '../types';
import { ConfigurationError } from '../errors';

// No 9x9 puzzle with fewer than 17 clues has a unique solution.
export const MIN_CLUES = 17;
export const MAX_CLUES = 81;

// Clues kept after carving. Ranges must not overlap in the wrong direction:
// every easy puzzle keeps at least as many clues as any medium one, and so on.
export const DEFAULT_CLUE_TARGETS: ClueTargets = {
    easy: { min: 46, max: 50 },
    medium: { min: 32, max: 45 },
    hard: { min: 24, max: 31 },
};

/**
 * Merges overrides onto the default clue ranges and validates the result.
 *
 * @throws {ConfigurationError} If a range is out of bounds, inverted, or breaks the easy >= medium >= hard ordering.
 */
export const resolveClueTargets = (overrides: Partial<ClueTargets> = {}): ClueTargets => {
    // Key by key, so an explicit `undefined` falls back to the default.
    const targets: ClueTargets = {
        easy: overrides.easy ?? DEFAULT_CLUE_TARGETS.easy,
        medium: overrides.medium ?? DEFAULT_CLUE_TARGETS.medium,
        hard: overrides.hard ?? DEFAULT_CLUE_TARGETS.hard,
    };

    for (const difficulty of DIFFICULTIES) {
        const { min, max } = targets[difficulty];
        if (!Number.isInteger(min) || !Number.isInteger(max)) {
            throw new ConfigurationError(`Clue range for '${difficulty}' must use whole numbers.`);
        }
        if (min < MIN_CLUES || max > MAX_CLUES) {
            throw new ConfigurationError(`Clue range for '${difficulty}' must lie within ${MIN_CLUES}-${MAX_CLUES}, got ${min}-${max}.`);
        }
        if (min > max) {
            throw new ConfigurationError(`Clue range for '${difficulty}' is inverted: ${min}-${max}.`);
        }
    }

    for (let i = 1; i < DIFFICULTIES.length; i++) {
        const easier = DIFFICULTIES[i - 1];
        const harder = DIFFICULTIES[i];
        if (targets[harder].max > targets[easier].min) {
            throw new ConfigurationError(`'${harder}' may keep more clues (${targets[harder].max}) than '${easier}' (${targets[easier].min}).`);
        }
    }

    return targets;
};

/**
 * Draws a clue count uniformly from a range.
 */
export const pickClueTarget = (range: ClueRange, random: RandomSource): number => {
    return range.min + Math.floor(random() * (range.max - range.min + 1));
};

export const parseDifficulty = (value: string): Difficulty => {
    const normalized = value.trim().toLowerCase();
    const match = DIFFICULTIES.find(d => d === normalized);
    if (!match) {
        throw new ConfigurationError(`Unknown difficulty '${value}'. Expected one of: ${DIFFICULTIES.join(', ')}.`);
    }
    return match;
};
