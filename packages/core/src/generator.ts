import { type CaseStyle, DEFAULT_CASE_STYLE, formatName } from "./case-style.ts";
import { NamesError, NamesErrorCode } from "./errors.ts";
import { type RandomSource, mathRandom, randomSuffix } from "./random.ts";
import { WordSource } from "./word-source.ts";
import { ADJECTIVES, NOUNS } from "./words.ts";

export interface NameGeneratorOptions {
	adjectives?: readonly string[];
	nouns?: readonly string[];
	style?: CaseStyle;
	/** Append a 4-digit number. Numbered style always gets one regardless */
	numbered?: boolean;
	random?: RandomSource;
}

/**
 * Unbounded sequence of random names like "rusty-nail".
 *
 * Every pull is an independent draw: names may repeat and the sequence never
 * ends, so callers take the prefix they need:
 *
 * ```ts
 * const names = NameGenerator.withNumbers("TitleCase").take(3);
 * // ["Misty Lantern 0421", "Brave Otter 7310", "Calm Reef 0098"]
 * ```
 *
 * Not safe to share between concurrent owners; give each its own instance.
 */
export class NameGenerator implements IterableIterator<string> {
	readonly style: CaseStyle;
	readonly numbered: boolean;
	private readonly words: WordSource;
	private readonly random: RandomSource;

	constructor(options: NameGeneratorOptions = {}) {
		this.random = options.random ?? mathRandom;
		this.words = new WordSource(
			options.adjectives ?? ADJECTIVES,
			options.nouns ?? NOUNS,
			this.random,
		);
		this.style = options.style ?? DEFAULT_CASE_STYLE;
		this.numbered = options.numbered ?? false;
	}

	/**
	 * Built-in word lists, no number appended
	 */
	static withNaming(style: CaseStyle): NameGenerator {
		return new NameGenerator({ style, numbered: false });
	}

	/**
	 * Built-in word lists with a number appended
	 */
	static withNumbers(style: CaseStyle): NameGenerator {
		return new NameGenerator({ style, numbered: true });
	}

	generate(): string {
		const adjective = this.words.pickAdjective();
		const noun = this.words.pickNoun();
		const number = this.numbered ? randomSuffix(this.random) : undefined;

		if (this.style === "Numbered") {
			// Separate draw; any number above is discarded
			return formatName("Numbered", { adjective, noun, number: randomSuffix(this.random) });
		}

		return formatName(this.style, { adjective, noun, number });
	}

	next(): IteratorResult<string> {
		return { done: false, value: this.generate() };
	}

	[Symbol.iterator](): NameGenerator {
		return this;
	}

	take(count: number): string[] {
		if (!Number.isInteger(count) || count < 0) {
			throw new NamesError(
				NamesErrorCode.INVALID_COUNT,
				`Invalid name count: ${count}`,
				"Count must be a whole number of zero or more",
			);
		}

		const names: string[] = [];
		for (let i = 0; i < count; i++) {
			names.push(this.generate());
		}
		return names;
	}
}
