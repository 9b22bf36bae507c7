import { NamesError, NamesErrorCode } from "./errors.ts";
import { type RandomSource, mathRandom, randomIndex } from "./random.ts";

export type WordKind = "adjective" | "noun";

export type WordList = readonly string[];

const WORD_PATTERN = /^[a-z]+$/;

/**
 * Lowercase a word and check it is a single ASCII token.
 * Throws EMPTY_WORD_LIST for "" and INVALID_WORD for anything else that is not [a-z]+.
 */
export function normalizeWord(word: string, kind: WordKind): string {
	const normalized = word.toLowerCase();
	if (normalized === "") {
		throw new NamesError(
			NamesErrorCode.EMPTY_WORD_LIST,
			`The ${kind} list contains an empty word`,
			`Remove empty entries from the ${kind} list`,
		);
	}
	if (!WORD_PATTERN.test(normalized)) {
		throw new NamesError(
			NamesErrorCode.INVALID_WORD,
			`Invalid ${kind}: "${word}"`,
			"Words must be single ASCII words made of letters a-z",
		);
	}
	return normalized;
}

/**
 * Validate a caller-supplied list and freeze a lowercased copy of it.
 * Throws EMPTY_WORD_LIST so generation never starts with nothing to draw from.
 */
export function createWordList(words: readonly string[], kind: WordKind): WordList {
	if (words.length === 0) {
		throw new NamesError(
			NamesErrorCode.EMPTY_WORD_LIST,
			`The ${kind} list is empty`,
			`Provide at least one ${kind}, or omit the list to use the built-in words`,
		);
	}
	return Object.freeze(words.map((word) => normalizeWord(word, kind)));
}

/**
 * Pick one word uniformly at random, with replacement
 */
export function pickWord(list: WordList, random: RandomSource): string {
	const word = list.length > 0 ? list[randomIndex(random, list.length)] : undefined;
	if (word === undefined) {
		throw new NamesError(NamesErrorCode.EMPTY_WORD_LIST, "Cannot pick a word from an empty list");
	}
	return word;
}

export class WordSource {
	readonly adjectives: WordList;
	readonly nouns: WordList;
	private readonly random: RandomSource;

	constructor(adjectives: readonly string[], nouns: readonly string[], random: RandomSource = mathRandom) {
		this.adjectives = createWordList(adjectives, "adjective");
		this.nouns = createWordList(nouns, "noun");
		this.random = random;
	}

	pick(list: WordList): string {
		return pickWord(list, this.random);
	}

	pickAdjective(): string {
		return this.pick(this.adjectives);
	}

	pickNoun(): string {
		return this.pick(this.nouns);
	}
}
