import { NamesError, NamesErrorCode } from "./errors.ts";
import { formatSuffix } from "./random.ts";

export const CASE_STYLES = [
	"Plain",
	"Numbered",
	"TitleCase",
	"CamelCase",
	"ClassCase",
	"KebabCase",
	"TrainCase",
	"ScreamingSnakeCase",
	"TableCase",
	"SentenceCase",
	"SnakeCase",
	"PascalCase",
] as const;

export type CaseStyle = (typeof CASE_STYLES)[number];

export const DEFAULT_CASE_STYLE: CaseStyle = "KebabCase";

export interface NameParts {
	adjective: string;
	noun: string;
	number?: number;
}

type TokenCase = (token: string) => string;

interface StyleRule {
	separator: string;
	adjective: TokenCase;
	noun: TokenCase;
}

export const lowerToken: TokenCase = (token) => token.toLowerCase();

export const upperToken: TokenCase = (token) => token.toUpperCase();

export const capitalizeToken: TokenCase = (token) =>
	token.charAt(0).toUpperCase() + token.slice(1).toLowerCase();

const kebab: StyleRule = { separator: "-", adjective: lowerToken, noun: lowerToken };
const snake: StyleRule = { separator: "_", adjective: lowerToken, noun: lowerToken };
const pascal: StyleRule = { separator: "", adjective: capitalizeToken, noun: capitalizeToken };

// Numbered shares the kebab rule; the generator is what forces its number
const STYLE_RULES: Record<CaseStyle, StyleRule> = {
	Plain: kebab,
	Numbered: kebab,
	KebabCase: kebab,
	TitleCase: { separator: " ", adjective: capitalizeToken, noun: capitalizeToken },
	CamelCase: { separator: "", adjective: lowerToken, noun: capitalizeToken },
	ClassCase: pascal,
	PascalCase: pascal,
	TrainCase: { separator: "-", adjective: capitalizeToken, noun: capitalizeToken },
	ScreamingSnakeCase: { separator: "_", adjective: upperToken, noun: upperToken },
	TableCase: snake,
	SnakeCase: snake,
	SentenceCase: { separator: " ", adjective: capitalizeToken, noun: lowerToken },
};

export function isCaseStyle(value: string): value is CaseStyle {
	return CASE_STYLES.some((style) => style === value);
}

/**
 * Resolve a style from its exact (case-sensitive) name
 */
export function parseCaseStyle(name: string): CaseStyle {
	if (isCaseStyle(name)) {
		return name;
	}
	throw new NamesError(
		NamesErrorCode.UNKNOWN_CASE_STYLE,
		`Unknown naming strategy: ${name}`,
		`Use one of: ${CASE_STYLES.join(", ")}`,
	);
}

export function formatName(style: CaseStyle, parts: NameParts): string {
	const rule = STYLE_RULES[style];
	const tokens = [rule.adjective(parts.adjective), rule.noun(parts.noun)];
	if (parts.number !== undefined) {
		tokens.push(formatSuffix(parts.number));
	}
	return tokens.join(rule.separator);
}

/**
 * Example shape of a style for help output, e.g. "Adjective-Noun"
 */
export function describeCaseStyle(style: CaseStyle): string {
	const shape = formatName(style, { adjective: "adjective", noun: "noun" });
	return style === "Numbered" ? `${shape}-number` : shape;
}
