// =============================================================================
// Raw Credentials
// =============================================================================

/** Scalar values a service broker may place in a credential bag */
export type CredentialValue = string | number | boolean | null;

/**
 * Credential bag of a single bound service, as read from the binding.
 */
export type ServiceCredentials = Readonly<Record<string, CredentialValue | undefined>>;

// =============================================================================
// Typed Credentials
// =============================================================================

/**
 * Fields the agent knows by name.
 * Required fields are stringified when read; proxy fields keep their raw value
 * so emptiness can be decided at emission time.
 */
export interface KnownCredentials {
	apiKey: string;
	serviceKey: string;
	teamserverUrl: string;
	username: string;
	proxyHost?: CredentialValue;
	proxyPort?: CredentialValue;
	proxyUser?: CredentialValue;
	proxyPass?: CredentialValue;
}
