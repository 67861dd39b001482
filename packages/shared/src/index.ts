export * from "./constants.js";
export type { CredentialValue, KnownCredentials, ServiceCredentials } from "./types/credentials.js";
export type { ApplicationDetailsDocument, ServiceBinding, ServiceBindingsDocument } from "./types/bindings.js";
export type { ResolvedArtifact, ResolvedVersion } from "./types/version.js";
export { LAUNCH_OPTION_KIND, type EnvironmentAssignment, type LaunchOption } from "./types/droplet.js";
