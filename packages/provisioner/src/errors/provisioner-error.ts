/**
 * Base class for provisioner errors
 *
 * Carries a stable code so callers can branch without matching on messages.
 */
export class ProvisionerError extends Error {
	readonly code: string;

	constructor(message: string, code: string = "PROVISIONER_ERROR") {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
	}
}
