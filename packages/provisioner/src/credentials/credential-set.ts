import type { CredentialValue, KnownCredentials, ServiceCredentials } from "@agent-provisioner/shared";
import { PASSTHROUGH_PREFIX, PROXY_CREDENTIAL_KEYS, REQUIRED_CREDENTIAL_KEYS } from "@agent-provisioner/shared";
import { MissingCredentialError } from "../errors/index.js";

/**
 * String form of a credential value: null and absent values become empty.
 */
export function stringifyCredential(value: CredentialValue | undefined): string {
	return value === null || value === undefined ? "" : String(value);
}

/**
 * Normalized, read-only view of one bound service's credentials.
 *
 * Known fields are typed; every `CONTRAST__` key is kept, in binding order,
 * in `passthrough` with its stringified value.
 */
export class CredentialSet {
	private constructor(
		readonly known: Readonly<KnownCredentials>,
		readonly passthrough: ReadonlyMap<string, string>,
	) {
		Object.freeze(this);
	}

	/**
	 * Read a credential bag once.
	 * @throws MissingCredentialError if any required key is absent.
	 */
	static from(credentials: ServiceCredentials): CredentialSet {
		const missing = Object.values(REQUIRED_CREDENTIAL_KEYS)
			.filter(key => !Object.hasOwn(credentials, key));
		if (missing.length > 0) {
			throw new MissingCredentialError(missing);
		}

		const known: KnownCredentials = {
			apiKey: stringifyCredential(credentials[REQUIRED_CREDENTIAL_KEYS.API_KEY]),
			serviceKey: stringifyCredential(credentials[REQUIRED_CREDENTIAL_KEYS.SERVICE_KEY]),
			teamserverUrl: stringifyCredential(credentials[REQUIRED_CREDENTIAL_KEYS.TEAMSERVER_URL]),
			username: stringifyCredential(credentials[REQUIRED_CREDENTIAL_KEYS.USERNAME]),
			proxyHost: credentials[PROXY_CREDENTIAL_KEYS.HOST],
			proxyPort: credentials[PROXY_CREDENTIAL_KEYS.PORT],
			proxyUser: credentials[PROXY_CREDENTIAL_KEYS.USER],
			proxyPass: credentials[PROXY_CREDENTIAL_KEYS.PASS],
		};

		const passthrough = new Map<string, string>();
		for (const [key, value] of Object.entries(credentials)) {
			if (key.startsWith(PASSTHROUGH_PREFIX)) {
				passthrough.set(key, stringifyCredential(value));
			}
		}

		return new CredentialSet(Object.freeze(known), passthrough);
	}
}
