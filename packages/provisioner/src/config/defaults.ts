/**
 * Default configuration values for the provisioner.
 */

import type { ProvisionerConfig } from "../types/index.js";
import { defaultSandboxDir } from "../droplet/index.js";

export function getDefaultConfig(appRoot: string = process.cwd()): ProvisionerConfig {
	return {
		phase: "detect",
		appRoot,
		sandboxDir: defaultSandboxDir(appRoot),
		agentVersion: null,
		artifactUri: null,
		vcapServices: null,
		vcapApplication: null,
		javaOpts: [],
		logLevel: "info",
	};
}
