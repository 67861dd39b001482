import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when the container is asked for a token nothing was registered under
 */
export class UnregisteredDependencyError extends ProvisionerError {
	constructor(readonly token: string) {
		super(`No registration found for ${token}`, "UNREGISTERED_DEPENDENCY");
	}
}
