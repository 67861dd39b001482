import type { ResolvedVersion } from "@agent-provisioner/shared";
import { ARTIFACT_PREFIX, INFLECTION_VERSION } from "@agent-provisioner/shared";
import { compareVersions, shortVersion } from "./tokenized-version.js";

/**
 * Artifact file name for a resolved agent version.
 * Releases before 3.4.3 were published as `contrast-engine`, later ones as `java-agent`.
 */
export function selectArtifactName(version: ResolvedVersion): string {
	const prefix = compareVersions(version, INFLECTION_VERSION) < 0
		? ARTIFACT_PREFIX.LEGACY
		: ARTIFACT_PREFIX.CURRENT;
	return `${prefix}-${shortVersion(version)}.jar`;
}
