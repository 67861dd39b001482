import type { EnvironmentAssignment } from "@agent-provisioner/shared";
import type { CredentialSet } from "../credentials/credential-set.js";
import type { LaunchOptionSet } from "./droplet.js";

/**
 * Derives the agent's environment from credentials and existing launch options.
 */
export interface EnvironmentBuilder {
	build(
		credentials: CredentialSet,
		existingLaunchOptions: LaunchOptionSet,
		applicationName: string,
	): EnvironmentAssignment[];
}
