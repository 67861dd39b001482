import type { EnvironmentAssignment } from "@agent-provisioner/shared";

/**
 * What the release phase contributed to the droplet.
 */
export interface ReleaseResult {
	/** The `-javaagent:` option appended to the launch options */
	launchOption: string;
	/** Environment assignments, in the order they were appended */
	environment: EnvironmentAssignment[];
}

/**
 * Provisioning unit driven through detect, compile and release by an orchestrator.
 */
export interface AgentProvisioner {
	/** True when exactly one matching service with all required credentials is bound */
	supports(): boolean;
	/** `contrast-security-agent=<version>` when supported, null otherwise */
	detect(): string | null;
	/** Install the agent artifact into the sandbox */
	compile(): void;
	/** Write the launch option and environment into the droplet */
	release(): ReleaseResult;
}
