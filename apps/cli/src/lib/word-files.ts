import { readFile } from "node:fs/promises";
import {
	NamesError,
	NamesErrorCode,
	type WordKind,
	getErrorDetails,
	normalizeWord,
} from "@namesmith/core";

interface WordLine {
	line: number;
	text: string;
}

function wordLines(text: string): WordLine[] {
	return text
		.split(/\r?\n/)
		.map((raw, index) => ({ line: index + 1, text: raw.trim() }))
		.filter(({ text }) => text !== "" && !text.startsWith("#"));
}

/**
 * One word per line; blank lines and `#` comments are skipped
 */
export function parseWordList(text: string): string[] {
	return wordLines(text).map(({ text }) => text.toLowerCase());
}

export async function loadWordList(path: string, kind: WordKind): Promise<string[]> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (err) {
		throw new NamesError(
			NamesErrorCode.INVALID_WORD_FILE,
			`Could not read ${kind} list ${path}: ${getErrorDetails(err).message}`,
			"Check that the file exists and is readable",
		);
	}

	const words: string[] = [];
	for (const { line, text: word } of wordLines(text)) {
		try {
			words.push(normalizeWord(word, kind));
		} catch (err) {
			const details = getErrorDetails(err);
			throw new NamesError(
				NamesErrorCode.INVALID_WORD_FILE,
				`${path}:${line}: ${details.message}`,
				details.suggestion,
			);
		}
	}

	if (words.length === 0) {
		throw new NamesError(
			NamesErrorCode.EMPTY_WORD_LIST,
			`No ${kind}s found in ${path}`,
			"Add at least one word per line",
		);
	}
	return words;
}
