/**
 * Source of uniformly distributed floats in [0, 1).
 *
 * Swap in a deterministic implementation to reproduce a sequence of names.
 */
export interface RandomSource {
	next(): number;
}

export const mathRandom: RandomSource = {
	next: () => Math.random(),
};

export const SUFFIX_MIN = 1;
export const SUFFIX_MAX = 9999;

export function randomIndex(random: RandomSource, length: number): number {
	const index = Math.floor(random.next() * length);
	// Guard against sources that return exactly 1
	return Math.min(index, length - 1);
}

/**
 * Draw a numeric suffix in 1..=9999 (never 0)
 */
export function randomSuffix(random: RandomSource): number {
	return SUFFIX_MIN + randomIndex(random, SUFFIX_MAX - SUFFIX_MIN + 1);
}

export function formatSuffix(value: number): string {
	return String(value).padStart(4, "0");
}
