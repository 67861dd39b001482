import type { AgentProvisioner, Droplet, Phase } from "./types/index.js";
import { PHASE } from "./types/index.js";
import { InvalidEnvironmentValueError } from "./errors/index.js";

const JAVA_OPTS = "JAVA_OPTS";
const LINE_BREAK = /[\r\n]/;

/**
 * Exit code and stdout lines of one lifecycle phase.
 */
export interface PhaseOutcome {
	exitCode: number;
	lines: string[];
}

/**
 * One `KEY=value` line of release output.
 * @throws InvalidEnvironmentValueError when the value would break the line format.
 */
function outputLine(key: string, value: string): string {
	if (LINE_BREAK.test(value)) {
		throw new InvalidEnvironmentValueError(key);
	}
	return `${key}=${value}`;
}

/**
 * Run a single phase the way a buildpack orchestrator expects:
 * detect exits 1 when the agent does not apply, release prints the droplet's
 * launch options followed by one `KEY=value` line per environment variable.
 */
export function runPhase(provisioner: AgentProvisioner, droplet: Droplet, phase: Phase): PhaseOutcome {
	switch (phase) {
		case PHASE.DETECT: {
			const identifier = provisioner.detect();
			return identifier === null
				? { exitCode: 1, lines: [] }
				: { exitCode: 0, lines: [identifier] };
		}
		case PHASE.COMPILE:
			provisioner.compile();
			return { exitCode: 0, lines: [] };
		case PHASE.RELEASE: {
			const { environment } = provisioner.release();
			return {
				exitCode: 0,
				lines: [
					outputLine(JAVA_OPTS, droplet.launchOptions.toString()),
					...environment.map(({ key, value }) => outputLine(key, value)),
				],
			};
		}
	}
}
