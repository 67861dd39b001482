import { ProvisionerError } from "./provisioner-error.js";

export class InvalidVersionError extends ProvisionerError {
	constructor(version: string) {
		super(`Invalid version: ${version}`, "INVALID_VERSION");
	}
}
