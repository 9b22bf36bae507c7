import type { RandomSource } from "./random.ts";

/**
 * Replays `values` in order, wrapping around at the end
 */
export function sequence(values: number[]): RandomSource {
	let i = 0;
	return {
		next: () => values[i++ % values.length] ?? 0,
	};
}

// mulberry32
export function seeded(seed: number): RandomSource {
	let state = seed >>> 0;
	return {
		next() {
			state = (state + 0x6d2b79f5) >>> 0;
			let t = state;
			t = Math.imul(t ^ (t >>> 15), t | 1);
			t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
			return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
		},
	};
}
