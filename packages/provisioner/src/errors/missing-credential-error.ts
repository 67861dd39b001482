import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when a credential bag lacks keys the agent requires
 */
export class MissingCredentialError extends ProvisionerError {
	readonly missingKeys: readonly string[];

	constructor(missingKeys: readonly string[]) {
		super(`Missing required credentials: ${missingKeys.join(", ")}`, "MISSING_CREDENTIAL");
		this.missingKeys = missingKeys;
	}
}
