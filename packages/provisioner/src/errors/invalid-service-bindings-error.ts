import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when the service bindings document cannot be read
 */
export class InvalidServiceBindingsError extends ProvisionerError {
	constructor(message: string) {
		super(`Invalid service bindings: ${message}`, "INVALID_SERVICE_BINDINGS");
	}
}
