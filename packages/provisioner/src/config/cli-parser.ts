/**
 * CLI argument parsing for provisioner configuration.
 */

import type { LogLevel } from "../logger/index.js";
import { isLogLevel } from "../logger/index.js";
import { type Phase, isPhase } from "../types/index.js";
import { InvalidConfigError } from "../errors/index.js";

export interface ParsedArgs {
	phase?: Phase;
	appRoot?: string;
	sandboxDir?: string;
	agentVersion?: string;
	artifactUri?: string;
	logLevel?: LogLevel;
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = {};

	for (const arg of args) {
		if (arg.startsWith("--app-root=")) {
			parsed.appRoot = arg.slice("--app-root=".length);
		} else if (arg.startsWith("--sandbox-dir=")) {
			parsed.sandboxDir = arg.slice("--sandbox-dir=".length);
		} else if (arg.startsWith("--agent-version=")) {
			parsed.agentVersion = arg.slice("--agent-version=".length);
		} else if (arg.startsWith("--artifact-uri=")) {
			parsed.artifactUri = arg.slice("--artifact-uri=".length);
		} else if (arg.startsWith("--log-level=")) {
			const value = arg.slice("--log-level=".length);
			if (!isLogLevel(value)) {
				throw new InvalidConfigError(`unknown log level "${value}"`);
			}
			parsed.logLevel = value;
		} else if (!arg.startsWith("--") && parsed.phase === undefined) {
			if (!isPhase(arg)) {
				throw new InvalidConfigError(`unknown phase "${arg}"`);
			}
			parsed.phase = arg;
		}
	}

	return parsed;
}
