/**
 * A three-component version resolved from the artifact repository.
 */
export interface ResolvedVersion {
	major: number;
	minor: number;
	patch: number;
	/** Build qualifier after the patch number, empty when absent */
	qualifier: string;
	/** The version exactly as it was resolved, e.g. `3.4.2_756` */
	raw: string;
}

/**
 * A resolved version together with the location of its artifact.
 */
export interface ResolvedArtifact {
	version: ResolvedVersion;
	/** Where the install phase fetches the artifact from, null when not configured */
	uri: string | null;
}
