import type { ResolvedArtifact } from "@agent-provisioner/shared";
import type { VersionResolver } from "../types/index.js";
import { MissingVersionError } from "../errors/index.js";
import { parseVersion } from "./tokenized-version.js";

/**
 * Resolver for a version the orchestrator already pinned.
 * Range resolution against a remote index happens upstream.
 */
export class StaticVersionResolver implements VersionResolver {
	constructor(
		private readonly version: string | null,
		private readonly uri: string | null,
	) {}

	resolve(): ResolvedArtifact {
		if (this.version === null || this.version.trim() === "") {
			throw new MissingVersionError();
		}
		return {
			version: parseVersion(this.version),
			uri: this.uri === null || this.uri.trim() === "" ? null : this.uri,
		};
	}
}
