import type { ResolvedArtifact } from "@agent-provisioner/shared";

/**
 * Maps the configured version to a concrete version and artifact location.
 * Malformed versions are this collaborator's failure to report.
 */
export interface VersionResolver {
	resolve(): ResolvedArtifact;
}
