export const LOG_LEVELS = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string | undefined): value is LogLevel {
	return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;

let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getCurrentLevel(): LogLevel {
	return currentLevel;
}
