import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when CLI arguments or environment variables hold an unusable value
 */
export class InvalidConfigError extends ProvisionerError {
	constructor(message: string) {
		super(`Invalid configuration: ${message}`, "INVALID_CONFIG");
	}
}
