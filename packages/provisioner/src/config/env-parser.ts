/**
 * Environment variable parsing utilities for provisioner configuration.
 */

import type { LogLevel } from "../logger/index.js";
import { isLogLevel } from "../logger/index.js";
import { type Phase, isPhase } from "../types/index.js";
import { InvalidConfigError } from "../errors/index.js";

function parseEnvString(key: string): string | undefined {
	const value = process.env[key];
	return value === undefined || value.trim() === "" ? undefined : value;
}

function parseEnvPhase(key: string): Phase | undefined {
	const value = parseEnvString(key);
	if (value === undefined) {
		return undefined;
	}
	if (!isPhase(value)) {
		throw new InvalidConfigError(`${key} must be one of detect, compile, release`);
	}
	return value;
}

function parseEnvLogLevel(key: string): LogLevel | undefined {
	const value = parseEnvString(key);
	return isLogLevel(value) ? value : undefined;
}

export interface ParsedEnv {
	phase?: Phase;
	appRoot?: string;
	sandboxDir?: string;
	agentVersion?: string;
	artifactUri?: string;
	vcapServices?: string;
	vcapApplication?: string;
	javaOpts?: string[];
	logLevel?: LogLevel;
}

export function parseEnvVars(): ParsedEnv {
	const javaOpts = parseEnvString("JAVA_OPTS");
	return {
		phase: parseEnvPhase("PROVISIONER_PHASE"),
		appRoot: parseEnvString("APP_ROOT"),
		sandboxDir: parseEnvString("CONTRAST_SANDBOX_DIR"),
		agentVersion: parseEnvString("CONTRAST_AGENT_VERSION"),
		artifactUri: parseEnvString("CONTRAST_AGENT_URI"),
		vcapServices: parseEnvString("VCAP_SERVICES"),
		vcapApplication: parseEnvString("VCAP_APPLICATION"),
		javaOpts: javaOpts === undefined ? undefined : [javaOpts],
		logLevel: parseEnvLogLevel("LOG_LEVEL"),
	};
}
