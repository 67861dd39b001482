/**
 * CLI entry point for the provisioner.
 * Runs one lifecycle phase per invocation.
 */

import { loadConfig } from "./config/index.js";
import { DROPLET, LOGGER, PROVISIONER, createProvisionerContainer } from "./di/index.js";
import { setLogLevel } from "./logger/index.js";
import { runPhase } from "./lifecycle.js";
import { formatError } from "./utils/index.js";

/**
 * Check if this module is being run directly (as CLI entry point).
 * Works for both .js (compiled) and .ts (tsx) execution.
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	return scriptPath.includes("provisioner") && (
		scriptPath.endsWith("cli.js") ||
		scriptPath.endsWith("cli.ts")
	);
}

export function main(args: string[]): number {
	const config = loadConfig(args);
	setLogLevel(config.logLevel);

	const container = createProvisionerContainer(config);
	const logger = container.resolve(LOGGER);
	try {
		const outcome = runPhase(container.resolve(PROVISIONER), container.resolve(DROPLET), config.phase);
		for (const line of outcome.lines) {
			process.stdout.write(`${line}\n`);
		}
		return outcome.exitCode;
	} catch (err) {
		logger.error(`Phase ${config.phase} failed: ${formatError(err)}`);
		return 1;
	}
}

if (isMainModule()) {
	try {
		process.exitCode = main(process.argv.slice(2));
	} catch (err) {
		console.error("Provisioner failed:", err);
		process.exitCode = 1;
	}
}
