import * as path from "node:path";
import { AGENT_SANDBOX_PATH } from "@agent-provisioner/shared";
import type { Droplet } from "../types/index.js";
import { EnvironmentVariablesImpl } from "./environment-variables.js";
import { LaunchOptionSetImpl } from "./launch-options.js";

export interface DropletOptions {
	root: string;
	sandbox?: string;
	javaOpts?: readonly string[];
}

export function defaultSandboxDir(root: string): string {
	return path.join(root, AGENT_SANDBOX_PATH);
}

export function createDroplet(options: DropletOptions): Droplet {
	return {
		root: options.root,
		sandbox: options.sandbox ?? defaultSandboxDir(options.root),
		launchOptions: new LaunchOptionSetImpl(options.javaOpts),
		environmentVariables: new EnvironmentVariablesImpl(),
	};
}
