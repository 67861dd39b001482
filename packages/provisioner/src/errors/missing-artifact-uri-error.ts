import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when the install phase runs without a location for the agent artifact
 */
export class MissingArtifactUriError extends ProvisionerError {
	constructor() {
		super("No agent artifact URI configured", "MISSING_ARTIFACT_URI");
	}
}
