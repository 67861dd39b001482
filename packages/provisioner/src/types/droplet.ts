import type { EnvironmentAssignment, LaunchOption } from "@agent-provisioner/shared";

/**
 * Ordered launch options of the application. Read and appended, never rewritten.
 */
export interface LaunchOptionSet {
	/** Textual match over the rendered options */
	contains(pattern: string | RegExp): boolean;
	/** True when an option sets the given system property */
	hasProperty(key: string): boolean;
	appendPreformatted(value: string): void;
	appendProperty(key: string, value: string): void;
	toArray(): readonly LaunchOption[];
	toString(): string;
}

/**
 * Insertion-ordered environment variables of the application. Append only.
 */
export interface EnvironmentVariableSink {
	append(key: string, value: string): void;
	entries(): readonly EnvironmentAssignment[];
	toString(): string;
}

/**
 * The application's runtime configuration, as seen by the provisioner.
 */
export interface Droplet {
	root: string;
	sandbox: string;
	launchOptions: LaunchOptionSet;
	environmentVariables: EnvironmentVariableSink;
}
