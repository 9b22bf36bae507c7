import { type CaseStyle, NamesError, NamesErrorCode, parseCaseStyle } from "@namesmith/core";
import { z } from "zod";

/** Strategy used when neither --strategy nor NAMESMITH_STRATEGY is set */
export const DEFAULT_STRATEGY: CaseStyle = "Plain";

export interface CliInput {
	/** Positional arguments; only the amount is accepted */
	args?: string[];
	strategy?: string;
	number?: boolean;
	adjectives?: string;
	nouns?: string;
	debug?: boolean;
}

export interface CliOptions {
	amount: number;
	strategy: CaseStyle;
	number: boolean;
	adjectivesFile?: string;
	nounsFile?: string;
	debug: boolean;
}

const AmountSchema = z.coerce.number().int().positive();

const EnvSchema = z.object({
	NAMESMITH_STRATEGY: z
		.string()
		.optional()
		.transform((value) => value || undefined),
	NAMESMITH_DEBUG: z
		.string()
		.optional()
		.transform((value) => value === "1" || value === "true"),
});

function parseAmount(raw: string | undefined): number {
	if (raw === undefined) return 1;

	const result = AmountSchema.safeParse(raw);
	if (!result.success) {
		throw new NamesError(
			NamesErrorCode.INVALID_COUNT,
			`Invalid amount: ${raw}`,
			"Amount must be a positive whole number, e.g. namesmith 5",
		);
	}
	return result.data;
}

/**
 * Resolve CLI flags against environment defaults.
 * Flags win over env vars, env vars win over built-in defaults.
 */
export function parseCliOptions(input: CliInput, env: NodeJS.ProcessEnv = process.env): CliOptions {
	const envConfig = EnvSchema.parse(env);
	const [amount, ...extra] = input.args ?? [];

	if (extra.length > 0) {
		throw new NamesError(
			NamesErrorCode.UNEXPECTED_ARGUMENT,
			`Unexpected argument: ${extra.join(" ")}`,
			"Pass a single amount, e.g. namesmith 5",
		);
	}

	return {
		amount: parseAmount(amount),
		strategy: parseCaseStyle(input.strategy ?? envConfig.NAMESMITH_STRATEGY ?? DEFAULT_STRATEGY),
		number: input.number ?? false,
		adjectivesFile: input.adjectives,
		nounsFile: input.nouns,
		debug: (input.debug ?? false) || envConfig.NAMESMITH_DEBUG,
	};
}
