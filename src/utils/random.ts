/** Returns a float in [0, 1). `Math.random` fits. */
export type RandomSource = () => number;

/** mulberry32: small, fast, and reproducible for a given seed. */
export function seededRandom(seed: number): RandomSource {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function uniform(random: RandomSource, lo: number, hi: number): number {
    return lo + random() * (hi - lo);
}

/** Inclusive on both ends. */
export function randomInt(random: RandomSource, lo: number, hi: number): number {
    return lo + Math.floor(random() * (hi - lo + 1));
}
