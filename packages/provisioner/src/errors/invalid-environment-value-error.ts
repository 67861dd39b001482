import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when a release line would span more than one line of output
 */
export class InvalidEnvironmentValueError extends ProvisionerError {
	constructor(readonly key: string) {
		super(`Value of ${key} contains a line break`, "INVALID_ENVIRONMENT_VALUE");
	}
}
