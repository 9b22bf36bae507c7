import { describe, expect, it } from "vitest";
import { NamesError, NamesErrorCode, getErrorDetails, isNamesError } from "./errors.ts";

describe("getErrorDetails", () => {
	it("keeps the message and suggestion of a NamesError", () => {
		const error = new NamesError(NamesErrorCode.INVALID_COUNT, "Invalid amount: 0", "Use 1 or more", {
			exitCode: 2,
		});

		expect(getErrorDetails(error)).toEqual({ message: "Invalid amount: 0", suggestion: "Use 1 or more" });
	});

	it("reads the message of a plain Error", () => {
		expect(getErrorDetails(new Error("ENOENT: no such file"))).toEqual({
			message: "ENOENT: no such file",
		});
	});

	it("stringifies anything else", () => {
		expect(getErrorDetails("boom")).toEqual({ message: "boom" });
	});
});

describe("isNamesError", () => {
	it("only matches NamesError", () => {
		expect(isNamesError(new NamesError(NamesErrorCode.INVALID_WORD, "bad"))).toBe(true);
		expect(isNamesError(new Error("bad"))).toBe(false);
	});
});
