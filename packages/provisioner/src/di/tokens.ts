/**
 * Injection tokens (identifiers) for all dependencies in the provisioner package.
 */

import type {
	AgentProvisioner,
	ApplicationDetails,
	ArtifactInstaller,
	Droplet,
	EnvironmentBuilder,
	Logger,
	ProvisionerConfig,
	ServiceBindings,
	VersionResolver,
} from "../types/index.js";

/**
 * Token type for identifying dependencies in the container.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

export const CONFIG = createToken<ProvisionerConfig>("ProvisionerConfig");

// ============================================================================
// Logging
// ============================================================================

export const LOGGER = createToken<Logger>("Logger");

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

// ============================================================================
// Collaborators
// ============================================================================

export const SERVICE_BINDINGS = createToken<ServiceBindings>("ServiceBindings");

export const APPLICATION_DETAILS = createToken<ApplicationDetails>("ApplicationDetails");

export const DROPLET = createToken<Droplet>("Droplet");

export const VERSION_RESOLVER = createToken<VersionResolver>("VersionResolver");

export const ARTIFACT_INSTALLER = createToken<ArtifactInstaller>("ArtifactInstaller");

// ============================================================================
// Core
// ============================================================================

export const ENVIRONMENT_BUILDER = createToken<EnvironmentBuilder>("EnvironmentBuilder");

export const PROVISIONER = createToken<AgentProvisioner>("AgentProvisioner");

export const TOKENS = {
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	SERVICE_BINDINGS,
	APPLICATION_DETAILS,
	DROPLET,
	VERSION_RESOLVER,
	ARTIFACT_INSTALLER,
	ENVIRONMENT_BUILDER,
	PROVISIONER,
} as const;
