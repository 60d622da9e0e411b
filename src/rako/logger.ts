// src/rako/logger.ts

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests.
 */
export interface HubLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function consoleLogger(prefix: string): HubLogger {
	return {
		debug: (...args: unknown[]) => console.debug(prefix, ...args),
		info: (...args: unknown[]) => console.info(prefix, ...args),
		warn: (...args: unknown[]) => console.warn(prefix, ...args),
		error: (...args: unknown[]) => console.error(prefix, ...args),
	};
}
