/**
 * Type definitions for the provisioner package.
 */
export type { AgentProvisioner, ReleaseResult } from "./provisioner.js";
export type { ArtifactInstaller } from "./artifact-installer.js";
export type { Droplet, EnvironmentVariableSink, LaunchOptionSet } from "./droplet.js";
export type { EnvironmentBuilder } from "./environment-builder.js";
export type { Logger } from "./logger.js";
export { PHASE, isPhase, type Phase, type ProvisionerConfig } from "./provisioner-config.js";
export type { ApplicationDetails, ServiceBindings } from "./service-bindings.js";
export type { VersionResolver } from "./version-resolver.js";
