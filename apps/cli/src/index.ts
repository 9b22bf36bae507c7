#!/usr/bin/env tsx
import { CASE_STYLES, describeCaseStyle, isNamesError } from "@namesmith/core";
import meow from "meow";
import { DEFAULT_STRATEGY, parseCliOptions } from "./lib/config.ts";
import { debug, enableDebug } from "./lib/debug.ts";
import { info, error as printError } from "./lib/output.ts";

const strategies = CASE_STYLES.map(
	(style) => `    ${`${style}${style === DEFAULT_STRATEGY ? "*" : ""}`.padEnd(22)}${describeCaseStyle(style)}`,
).join("\n");

const cli = meow(
	`
  namesmith — random names like "delirious-pail"

  Usage
    $ namesmith [amount] [options]

  Options
    -n, --number            Append a random 4-digit number
    -s, --strategy <name>   Naming strategy (env: NAMESMITH_STRATEGY)
    --adjectives <file>     Read adjectives from a file, one per line
    --nouns <file>          Read nouns from a file, one per line
    -d, --debug             Print debug output to stderr

  Strategies (* default)
${strategies}

  Examples
    $ namesmith
    $ namesmith 5 --number
    $ namesmith 3 -s TitleCase
`,
	{
		importMeta: import.meta,
		flags: {
			number: {
				type: "boolean",
				shortFlag: "n",
				default: false,
			},
			strategy: {
				type: "string",
				shortFlag: "s",
			},
			adjectives: {
				type: "string",
			},
			nouns: {
				type: "string",
			},
			debug: {
				type: "boolean",
				shortFlag: "d",
				default: false,
			},
		},
	},
);

try {
	const options = parseCliOptions({
		args: cli.input,
		strategy: cli.flags.strategy,
		number: cli.flags.number,
		adjectives: cli.flags.adjectives,
		nouns: cli.flags.nouns,
		debug: cli.flags.debug,
	});

	if (options.debug) {
		enableDebug();
	}
	debug("Resolved options", options);

	const { default: generate } = await import("./commands/generate.ts");
	await generate(options);
} catch (err) {
	if (isNamesError(err)) {
		printError(err.message);
		if (err.suggestion) {
			info(err.suggestion);
		}
		process.exit(err.meta?.exitCode ?? 1);
	}
	// Re-throw non-NamesError errors for stack trace
	throw err;
}
