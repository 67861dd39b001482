import type { ServiceCredentials } from "@agent-provisioner/shared";

/**
 * Lookup over the services bound to the application.
 * A service matches when the filter matches its name, label or a tag,
 * and its credentials carry every required key.
 */
export interface ServiceBindings {
	countMatching(filter: RegExp, ...requiredKeys: string[]): number;
	/** Credentials of the only matching service, null when none or several match */
	find(filter: RegExp, ...requiredKeys: string[]): ServiceCredentials | null;
	oneService(filter: RegExp, ...requiredKeys: string[]): boolean;
}

/**
 * Identity of the application being provisioned.
 */
export interface ApplicationDetails {
	/** Configured application name, null when absent or empty */
	readonly applicationName: string | null;
}
