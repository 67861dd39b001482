import type { EnvironmentAssignment } from "@agent-provisioner/shared";
import { AGENT_ENV, APPLICATION_NAME_PROPERTIES } from "@agent-provisioner/shared";
import type { EnvironmentBuilder, LaunchOptionSet, Logger } from "../types/index.js";
import { type CredentialSet, stringifyCredential } from "../credentials/credential-set.js";
import { NAMED_FIELD_RULES, PROXY_RULES, namedFieldValue } from "./rules.js";

/**
 * Builds the agent's `CONTRAST__` environment in three passes:
 * passthrough keys, named fields, then proxy settings.
 *
 * Each key is emitted once. When a later pass writes a key an earlier pass
 * already wrote, the later value replaces it and takes the later position,
 * so a named field always wins over a passthrough entry of the same name.
 */
export class EnvironmentBuilderImpl implements EnvironmentBuilder {
	constructor(private readonly logger: Logger) {}

	build(
		credentials: CredentialSet,
		existingLaunchOptions: LaunchOptionSet,
		applicationName: string,
	): EnvironmentAssignment[] {
		const assignments = new Map<string, string>();
		const assign = (key: string, value: string): void => {
			if (assignments.delete(key)) {
				this.logger.debug(`${key} from credentials replaced by named setting`);
			}
			assignments.set(key, value);
		};

		for (const [key, value] of credentials.passthrough) {
			assign(key, value);
		}

		for (const rule of NAMED_FIELD_RULES) {
			assign(rule.environmentKey, namedFieldValue(rule, credentials.known));
		}

		if (this.applicationNameConfigured(existingLaunchOptions)) {
			this.logger.info("Application name already set by a launch option, leaving it in place");
		} else {
			assign(AGENT_ENV.APPLICATION_NAME, applicationName);
		}

		for (const rule of PROXY_RULES) {
			const value = stringifyCredential(credentials.known[rule.field]);
			if (value !== "") {
				assign(rule.environmentKey, value);
			}
		}

		return [...assignments].map(([key, value]) => ({ key, value }));
	}

	private applicationNameConfigured(launchOptions: LaunchOptionSet): boolean {
		return APPLICATION_NAME_PROPERTIES.some(property => launchOptions.hasProperty(property));
	}
}
