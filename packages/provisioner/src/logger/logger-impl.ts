import type { Logger } from "../types/index.js";
import { LOG_LEVELS, type LogLevel, getCurrentLevel } from "./log-level.js";

function formatTimestamp(): string {
	return new Date().toISOString();
}

/**
 * Prefixed logger writing to stderr, so stdout carries only phase output.
 */
export class LoggerImpl implements Logger {
	constructor(private readonly prefix: string) {}

	private log(level: LogLevel, message: string): void {
		if (LOG_LEVELS[level] >= LOG_LEVELS[getCurrentLevel()]) {
			const timestamp = formatTimestamp();
			const levelStr = level.toUpperCase().padEnd(5);
			console.error(`[${timestamp}] [${levelStr}] [${this.prefix}] ${message}`);
		}
	}

	debug(message: string): void {
		this.log("debug", message);
	}

	info(message: string): void {
		this.log("info", message);
	}

	warn(message: string): void {
		this.log("warn", message);
	}

	error(message: string): void {
		this.log("error", message);
	}
}
