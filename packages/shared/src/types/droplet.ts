/**
 * A single environment variable assignment.
 */
export interface EnvironmentAssignment {
	key: string;
	value: string;
}

/**
 * Launch option kind values as a const object.
 */
export const LAUNCH_OPTION_KIND = {
	PREFORMATTED: "PREFORMATTED",
	PROPERTY: "PROPERTY",
} as const;

/**
 * A launch option, either raw text or a system property rendered as `-Dkey=value`.
 */
export type LaunchOption =
	| { kind: typeof LAUNCH_OPTION_KIND.PREFORMATTED; value: string }
	| { kind: typeof LAUNCH_OPTION_KIND.PROPERTY; key: string; value: string };
