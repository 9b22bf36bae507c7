// Debug utilities for timing and verbose logging

let debugEnabled = false;
const timers: Map<string, number> = new Map();
const startTime = Date.now();

export function enableDebug() {
	debugEnabled = true;
}

/**
 * Log debug message (only shown when --debug flag is set)
 */
export function debug(message: string, data?: unknown) {
	if (!debugEnabled) return;

	const elapsed = Date.now() - startTime;
	const prefix = `\x1b[90m[${elapsed}ms]\x1b[0m`;

	if (data !== undefined) {
		console.error(`${prefix} ${message}`, data);
	} else {
		console.error(`${prefix} ${message}`);
	}
}

/**
 * Start a timer for a step
 */
export function timerStart(label: string) {
	timers.set(label, Date.now());
	if (debugEnabled) {
		debug(`⏱ START: ${label}`);
	}
}

/**
 * End a timer and return duration in ms
 */
export function timerEnd(label: string): number {
	const start = timers.get(label);
	if (start === undefined) return 0;

	const duration = Date.now() - start;
	timers.delete(label);

	if (debugEnabled) {
		debug(`⏱ END: ${label} ${duration}ms`);
	}

	return duration;
}
