import { ProvisionerError } from "./provisioner-error.js";

/**
 * Thrown when no single bound service matches the agent's filter
 */
export class ServiceNotBoundError extends ProvisionerError {
	constructor(filter: RegExp, matches: number) {
		super(`Expected exactly one service matching ${filter.source}, found ${matches}`, "SERVICE_NOT_BOUND");
	}
}
