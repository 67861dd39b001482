import type { ServiceCredentials } from "./credentials.js";

/**
 * One bound service instance.
 */
export interface ServiceBinding {
	/** Instance name chosen by the user */
	name: string;
	/** Offering label from the marketplace */
	label: string;
	/** Free-form tags attached by the broker */
	tags: readonly string[];
	credentials: ServiceCredentials;
}

/**
 * Bound services grouped by label, the shape of `VCAP_SERVICES`.
 */
export type ServiceBindingsDocument = Record<string, ServiceBinding[]>;

/**
 * Subset of `VCAP_APPLICATION` the provisioner reads.
 */
export interface ApplicationDetailsDocument {
	application_name?: string | null;
}
