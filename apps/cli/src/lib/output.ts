function isColorEnabled(): boolean {
	return !process.env.NO_COLOR && process.stderr.isTTY !== false;
}

/**
 * Print an error message with cross
 */
export function error(message: string): void {
	const mark = isColorEnabled() ? "\x1b[31m✗\x1b[0m" : "✗";
	console.error(`${mark} ${message}`);
}

/**
 * Print an info message with arrow
 */
export function info(message: string): void {
	const mark = isColorEnabled() ? "\x1b[36m→\x1b[0m" : "→";
	console.error(`${mark} ${message}`);
}

/**
 * Print a warning message
 */
export function warn(message: string): void {
	const mark = isColorEnabled() ? "\x1b[33m!\x1b[0m" : "!";
	console.error(`${mark} ${message}`);
}
