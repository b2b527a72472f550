import { RandomSource } from '../types';

// A simple seeded PRNG (mulberry32)
export function mulberry32(seed: number): RandomSource {
    let a = seed;
    return function () {
        a |= 0; a = a + 0x6D2B79F5 | 0;
        let t = Math.imul(a ^ a >>> 15, 1 | a);
        t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

/**
 * Fisher-Yates shuffle. Reorders `items` in place and returns it.
 */
export function shuffle<T>(items: T[], random: RandomSource): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
}
