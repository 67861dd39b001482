/**
 * Provisioner package public API
 */

// Provisioner
export { AgentProvisionerImpl } from "./provisioner.js";
export { runPhase, type PhaseOutcome } from "./lifecycle.js";

// Configuration
export { loadConfig } from "./config/index.js";

// Core
export { CredentialSet, stringifyCredential } from "./credentials/credential-set.js";
export { EnvironmentBuilderImpl, NAMED_FIELD_RULES, PROXY_RULES } from "./environment/index.js";
export { compareVersions, parseVersion, selectArtifactName, shortVersion, StaticVersionResolver } from "./version/index.js";

// Collaborators
export { ApplicationDetailsImpl, ServiceBindingsImpl } from "./services/index.js";
export { createDroplet, EnvironmentVariablesImpl, LaunchOptionSetImpl, qualifyPath } from "./droplet/index.js";
export { LocalArtifactInstaller } from "./installer/index.js";
export { LoggerImpl, setLogLevel, type LogLevel } from "./logger/index.js";

export * from "./errors/index.js";

export type {
	AgentProvisioner,
	ApplicationDetails,
	ArtifactInstaller,
	Droplet,
	EnvironmentBuilder,
	EnvironmentVariableSink,
	LaunchOptionSet,
	Logger,
	Phase,
	ProvisionerConfig,
	ReleaseResult,
	ServiceBindings,
	VersionResolver,
} from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	configureContainer,
	createContainer,
	createProvisioner,
	createProvisionerContainer,
	createToken,
	TOKENS,
} from "./di/index.js";
export type { Container, Factory, LoggerFactory, Resolver, Token } from "./di/index.js";
