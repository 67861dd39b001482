/**
 * Provisioner configuration module.
 *
 * Load provisioner configuration from CLI arguments, environment variables, and defaults.
 * Priority: CLI > Environment > Defaults
 */

import type { ProvisionerConfig } from "../types/index.js";
import { parseCliArgs } from "./cli-parser.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";

/**
 * Load provisioner configuration from CLI arguments, environment variables, and defaults.
 * The sandbox follows the application root unless set explicitly.
 */
export function loadConfig(args: string[]): ProvisionerConfig {
	const cli = parseCliArgs(args);
	const env = parseEnvVars();
	const appRoot = cli.appRoot ?? env.appRoot;
	const defaults = getDefaultConfig(appRoot);

	return {
		phase: cli.phase ?? env.phase ?? defaults.phase,
		appRoot: defaults.appRoot,
		sandboxDir: cli.sandboxDir ?? env.sandboxDir ?? defaults.sandboxDir,
		agentVersion: cli.agentVersion ?? env.agentVersion ?? defaults.agentVersion,
		artifactUri: cli.artifactUri ?? env.artifactUri ?? defaults.artifactUri,
		vcapServices: env.vcapServices ?? defaults.vcapServices,
		vcapApplication: env.vcapApplication ?? defaults.vcapApplication,
		javaOpts: env.javaOpts ?? defaults.javaOpts,
		logLevel: cli.logLevel ?? env.logLevel ?? defaults.logLevel,
	};
}
