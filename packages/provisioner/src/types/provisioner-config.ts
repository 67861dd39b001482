import type { LogLevel } from "../logger/log-level.js";

/**
 * Lifecycle phase values as a const object.
 */
export const PHASE = {
	DETECT: "detect",
	COMPILE: "compile",
	RELEASE: "release",
} as const;

export type Phase = (typeof PHASE)[keyof typeof PHASE];

export function isPhase(value: string): value is Phase {
	return Object.values<string>(PHASE).includes(value);
}

/**
 * Provisioner configuration for a single lifecycle run.
 * Values are populated from CLI arguments, environment variables, or defaults.
 */
export interface ProvisionerConfig {
	phase: Phase;
	/** Application root; launch paths are qualified relative to it */
	appRoot: string;
	/** Directory the agent artifact is installed into */
	sandboxDir: string;
	/** Version the repository resolved, null when not yet known */
	agentVersion: string | null;
	/** Where the resolved artifact can be copied from */
	artifactUri: string | null;
	/** Raw `VCAP_SERVICES` document */
	vcapServices: string | null;
	/** Raw `VCAP_APPLICATION` document */
	vcapApplication: string | null;
	/** Launch options already configured for the application */
	javaOpts: string[];
	logLevel: LogLevel;
}
