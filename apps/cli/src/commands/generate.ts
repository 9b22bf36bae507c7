import { type CaseStyle, NameGenerator, type RandomSource } from "@namesmith/core";
import { debug, timerEnd, timerStart } from "../lib/debug.ts";
import { warn } from "../lib/output.ts";
import { loadWordList } from "../lib/word-files.ts";

export interface GenerateOptions {
	amount: number;
	strategy: CaseStyle;
	number: boolean;
	adjectivesFile?: string;
	nounsFile?: string;
	random?: RandomSource;
}

/**
 * Print `amount` names to stdout, one per line
 */
export default async function generate(options: GenerateOptions): Promise<void> {
	const adjectives = options.adjectivesFile
		? await loadWordList(options.adjectivesFile, "adjective")
		: undefined;
	const nouns = options.nounsFile ? await loadWordList(options.nounsFile, "noun") : undefined;

	if (options.strategy === "Numbered" && options.number) {
		warn("Numbered always appends a number; --number has no extra effect");
	}

	const generator = new NameGenerator({
		adjectives,
		nouns,
		style: options.strategy,
		numbered: options.number,
		random: options.random,
	});

	debug("Generating names", {
		amount: options.amount,
		strategy: generator.style,
		numbered: generator.numbered,
		adjectives: options.adjectivesFile ?? "built-in",
		nouns: options.nounsFile ?? "built-in",
	});

	timerStart("generate");
	for (let i = 0; i < options.amount; i++) {
		console.log(generator.generate());
	}
	timerEnd("generate");
}
