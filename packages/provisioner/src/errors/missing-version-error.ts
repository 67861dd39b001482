import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when a phase needs the agent version and none was configured
 */
export class MissingVersionError extends ProvisionerError {
	constructor() {
		super("No agent version configured", "MISSING_VERSION");
	}
}
