import type { ResolvedVersion } from "@agent-provisioner/shared";
import { InvalidVersionError } from "../errors/index.js";

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)(?:[_.+-]([0-9A-Za-z._+-]+))?$/;

/**
 * Parse `MAJOR.MINOR.PATCH` with an optional qualifier, e.g. `3.4.2_756`.
 * @throws InvalidVersionError if the string is not a three-component version.
 */
export function parseVersion(raw: string): ResolvedVersion {
	const match = VERSION_PATTERN.exec(raw.trim());
	if (!match) {
		throw new InvalidVersionError(raw);
	}
	const [, major, minor, patch, qualifier] = match;
	return {
		major: Number(major),
		minor: Number(minor),
		patch: Number(patch),
		qualifier: qualifier ?? "",
		raw: raw.trim(),
	};
}

type Triple = Pick<ResolvedVersion, "major" | "minor" | "patch">;

/**
 * Numeric ordering on (major, minor, patch). Qualifiers take no part.
 */
export function compareVersions(a: Triple, b: Triple): number {
	return (a.major - b.major) || (a.minor - b.minor) || (a.patch - b.patch);
}

export function shortVersion(version: Triple): string {
	return `${version.major}.${version.minor}.${version.patch}`;
}
