import type { KnownCredentials } from "@agent-provisioner/shared";
import { AGENT_ENV, AGENT_WORKING_DIR, TEAMSERVER_URL_SUFFIX } from "@agent-provisioner/shared";

type RequiredField = "apiKey" | "serviceKey" | "teamserverUrl" | "username";
type ProxyField = "proxyHost" | "proxyPort" | "proxyUser" | "proxyPass";

/**
 * A named environment variable fed either by a credential field or a fixed value.
 */
export type NamedFieldRule =
	| { environmentKey: string; field: RequiredField; suffix?: string }
	| { environmentKey: string; literal: string };

export interface ProxyRule {
	environmentKey: string;
	field: ProxyField;
}

/**
 * Named assignments, in emission order.
 */
export const NAMED_FIELD_RULES: readonly NamedFieldRule[] = [
	{ environmentKey: AGENT_ENV.API_KEY, field: "apiKey" },
	{ environmentKey: AGENT_ENV.SERVICE_KEY, field: "serviceKey" },
	{ environmentKey: AGENT_ENV.URL, field: "teamserverUrl", suffix: TEAMSERVER_URL_SUFFIX },
	{ environmentKey: AGENT_ENV.USER_NAME, field: "username" },
	{ environmentKey: AGENT_ENV.WORKING_DIR, literal: AGENT_WORKING_DIR },
];

/**
 * Proxy assignments, emitted only for non-empty values.
 */
export const PROXY_RULES: readonly ProxyRule[] = [
	{ environmentKey: AGENT_ENV.PROXY_HOST, field: "proxyHost" },
	{ environmentKey: AGENT_ENV.PROXY_PORT, field: "proxyPort" },
	{ environmentKey: AGENT_ENV.PROXY_USER, field: "proxyUser" },
	{ environmentKey: AGENT_ENV.PROXY_PASS, field: "proxyPass" },
];

export function namedFieldValue(rule: NamedFieldRule, credentials: Readonly<KnownCredentials>): string {
	if ("literal" in rule) {
		return rule.literal;
	}
	return `${credentials[rule.field]}${rule.suffix ?? ""}`;
}
