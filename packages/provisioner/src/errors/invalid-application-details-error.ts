import { ProvisionerError } from "./provisioner-error.js";

export class InvalidApplicationDetailsError extends ProvisionerError {
	constructor(message: string) {
		super(`Invalid application details: ${message}`, "INVALID_APPLICATION_DETAILS");
	}
}
