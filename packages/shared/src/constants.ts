/**
 * Shared constants for the provisioner.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Agent Identity
// =============================================================================

/** Identifier reported by detect, as in `contrast-security-agent=3.4.2` */
export const AGENT_ID = "contrast-security-agent";

/** Pattern a bound service's name, label or tags must match */
export const SERVICE_FILTER = /contrast-security/;

/** Sandbox directory of the agent, relative to the application root */
export const AGENT_SANDBOX_PATH = ".java-buildpack/contrast_security_agent";

// =============================================================================
// Credential Keys
// =============================================================================

/**
 * Credential keys a binding must expose for the agent to apply.
 */
export const REQUIRED_CREDENTIAL_KEYS = {
	API_KEY: "api_key",
	SERVICE_KEY: "service_key",
	TEAMSERVER_URL: "teamserver_url",
	USERNAME: "username",
} as const;

/**
 * Optional proxy credential keys.
 */
export const PROXY_CREDENTIAL_KEYS = {
	HOST: "proxy_host",
	PORT: "proxy_port",
	USER: "proxy_user",
	PASS: "proxy_pass",
} as const;

/** Credential keys with this prefix are passed through to the environment verbatim */
export const PASSTHROUGH_PREFIX = "CONTRAST__";

// =============================================================================
// Environment Variables
// =============================================================================

/**
 * Environment variable names written by the release phase.
 */
export const AGENT_ENV = {
	API_KEY: "CONTRAST__API__API_KEY",
	SERVICE_KEY: "CONTRAST__API__SERVICE_KEY",
	URL: "CONTRAST__API__URL",
	USER_NAME: "CONTRAST__API__USER_NAME",
	WORKING_DIR: "CONTRAST__AGENT__CONTRAST_WORKING_DIR",
	APPLICATION_NAME: "CONTRAST__APPLICATION__NAME",
	PROXY_HOST: "CONTRAST__API__PROXY__HOST",
	PROXY_PORT: "CONTRAST__API__PROXY__PORT",
	PROXY_USER: "CONTRAST__API__PROXY__USER",
	PROXY_PASS: "CONTRAST__API__PROXY__PASS",
} as const;

/** Appended to `teamserver_url` to form the API URL */
export const TEAMSERVER_URL_SUFFIX = "/Contrast";

/** Unexpanded on purpose: the shell resolves it at process start */
export const AGENT_WORKING_DIR = "$TMPDIR";

/** Application name used when the application details carry none */
export const DEFAULT_APPLICATION_NAME = "ROOT";

/**
 * System properties that already name the application.
 * When any launch option sets one, the name is not written to the environment.
 */
export const APPLICATION_NAME_PROPERTIES = [
	"contrast.override.appname",
	"contrast.application.name",
] as const;

// =============================================================================
// Artifact Naming
// =============================================================================

/**
 * First agent release published under the `java-agent` name.
 */
export const INFLECTION_VERSION = {
	major: 3,
	minor: 4,
	patch: 3,
} as const;

export const ARTIFACT_PREFIX = {
	LEGACY: "contrast-engine",
	CURRENT: "java-agent",
} as const;
