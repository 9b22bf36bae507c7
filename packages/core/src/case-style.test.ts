import { describe, expect, it } from "vitest";
import {
	CASE_STYLES,
	type CaseStyle,
	capitalizeToken,
	describeCaseStyle,
	formatName,
	isCaseStyle,
	parseCaseStyle,
} from "./case-style.ts";
import { NamesError, NamesErrorCode } from "./errors.ts";

const expected: Record<CaseStyle, [plain: string, numbered: string]> = {
	Plain: ["true-truth", "true-truth-0042"],
	Numbered: ["true-truth", "true-truth-0042"],
	TitleCase: ["True Truth", "True Truth 0042"],
	CamelCase: ["trueTruth", "trueTruth0042"],
	ClassCase: ["TrueTruth", "TrueTruth0042"],
	KebabCase: ["true-truth", "true-truth-0042"],
	TrainCase: ["True-Truth", "True-Truth-0042"],
	ScreamingSnakeCase: ["TRUE_TRUTH", "TRUE_TRUTH_0042"],
	TableCase: ["true_truth", "true_truth_0042"],
	SentenceCase: ["True truth", "True truth 0042"],
	SnakeCase: ["true_truth", "true_truth_0042"],
	PascalCase: ["TrueTruth", "TrueTruth0042"],
};

describe("formatName", () => {
	for (const style of CASE_STYLES) {
		const [plain, numbered] = expected[style];

		it(`formats ${style} without a number`, () => {
			expect(formatName(style, { adjective: "true", noun: "truth" })).toBe(plain);
		});

		it(`formats ${style} with a number`, () => {
			expect(formatName(style, { adjective: "true", noun: "truth", number: 42 })).toBe(numbered);
		});
	}

	it("pads the number to four digits", () => {
		expect(formatName("KebabCase", { adjective: "calm", noun: "reef", number: 1 })).toBe(
			"calm-reef-0001",
		);
		expect(formatName("KebabCase", { adjective: "calm", noun: "reef", number: 9999 })).toBe(
			"calm-reef-9999",
		);
	});

	it("normalizes mixed-case tokens", () => {
		expect(formatName("SentenceCase", { adjective: "bRAVE", noun: "OTTER" })).toBe("Brave otter");
		expect(formatName("SnakeCase", { adjective: "Brave", noun: "Otter" })).toBe("brave_otter");
	});
});

describe("capitalizeToken", () => {
	it("uppercases the first character and lowercases the rest", () => {
		expect(capitalizeToken("mIXED")).toBe("Mixed");
	});

	it("leaves an empty token empty", () => {
		expect(capitalizeToken("")).toBe("");
	});
});

describe("parseCaseStyle", () => {
	it("accepts every known style name", () => {
		for (const style of CASE_STYLES) {
			expect(parseCaseStyle(style)).toBe(style);
		}
	});

	it("rejects unknown names with a configuration error", () => {
		expect(() => parseCaseStyle("kebab-case")).toThrow(NamesError);

		try {
			parseCaseStyle("kebabcase");
		} catch (err) {
			expect(err).toBeInstanceOf(NamesError);
			if (err instanceof NamesError) {
				expect(err.code).toBe(NamesErrorCode.UNKNOWN_CASE_STYLE);
				expect(err.message).toBe("Unknown naming strategy: kebabcase");
				expect(err.suggestion).toContain("ScreamingSnakeCase");
			}
		}
	});

	it("is case-sensitive", () => {
		expect(isCaseStyle("KebabCase")).toBe(true);
		expect(isCaseStyle("kebabcase")).toBe(false);
	});
});

describe("describeCaseStyle", () => {
	it("shows the shape of each style", () => {
		expect(describeCaseStyle("Plain")).toBe("adjective-noun");
		expect(describeCaseStyle("Numbered")).toBe("adjective-noun-number");
		expect(describeCaseStyle("CamelCase")).toBe("adjectiveNoun");
		expect(describeCaseStyle("TrainCase")).toBe("Adjective-Noun");
		expect(describeCaseStyle("SentenceCase")).toBe("Adjective noun");
		expect(describeCaseStyle("ScreamingSnakeCase")).toBe("ADJECTIVE_NOUN");
	});
});
