export { NameGenerator } from "./generator.ts";
export type { NameGeneratorOptions } from "./generator.ts";
export {
	CASE_STYLES,
	DEFAULT_CASE_STYLE,
	capitalizeToken,
	describeCaseStyle,
	formatName,
	isCaseStyle,
	lowerToken,
	parseCaseStyle,
	upperToken,
} from "./case-style.ts";
export type { CaseStyle, NameParts } from "./case-style.ts";
export { WordSource, createWordList, normalizeWord, pickWord } from "./word-source.ts";
export type { WordKind, WordList } from "./word-source.ts";
export { formatSuffix, mathRandom, randomIndex, randomSuffix, SUFFIX_MAX, SUFFIX_MIN } from "./random.ts";
export type { RandomSource } from "./random.ts";
export { ADJECTIVES, NOUNS } from "./words.ts";
export { NamesError, NamesErrorCode, getErrorDetails, isNamesError } from "./errors.ts";
export type { NamesErrorMeta } from "./errors.ts";
