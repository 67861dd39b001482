/**
 * Tests for phase execution and the CLI entry point
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { main } from "../cli.js";
import { InvalidEnvironmentValueError } from "../errors/index.js";
import { runPhase } from "../lifecycle.js";
import {
	cleanupTempDir,
	createBindingsDocument,
	createTempDir,
	createTestCredentials,
	createTestProvisioner,
} from "./test-utils.js";

describe("runPhase", () => {
	it("prints the identifier and exits 0 when the agent applies", () => {
		const { provisioner, droplet } = createTestProvisioner();

		expect(runPhase(provisioner, droplet, "detect")).toEqual({
			exitCode: 0,
			lines: ["contrast-security-agent=3.4.2"],
		});
	});

	it("prints nothing and exits 1 when the agent does not apply", () => {
		const { provisioner, droplet } = createTestProvisioner({ credentials: [] });

		expect(runPhase(provisioner, droplet, "detect")).toEqual({ exitCode: 1, lines: [] });
	});

	it("installs the artifact on compile", () => {
		const { provisioner, droplet, installer } = createTestProvisioner();

		expect(runPhase(provisioner, droplet, "compile")).toEqual({ exitCode: 0, lines: [] });
		expect(installer.install).toHaveBeenCalledTimes(1);
	});

	it("prints launch options and environment on release", () => {
		const { provisioner, droplet } = createTestProvisioner({ javaOpts: ["-Xmx1g"] });

		const outcome = runPhase(provisioner, droplet, "release");

		expect(outcome.exitCode).toBe(0);
		expect(outcome.lines).toEqual([
			"JAVA_OPTS=-Xmx1g -javaagent:$PWD/.java-buildpack/contrast_security_agent/contrast-engine-3.4.2.jar",
			"CONTRAST__API__API_KEY=k1",
			"CONTRAST__API__SERVICE_KEY=s1",
			"CONTRAST__API__URL=https://h/Contrast",
			"CONTRAST__API__USER_NAME=u1",
			"CONTRAST__AGENT__CONTRAST_WORKING_DIR=$TMPDIR",
			"CONTRAST__APPLICATION__NAME=ROOT",
		]);
	});

	it.each(["line\nbreak", "carriage\rreturn"])("rejects a release value spanning lines: %j", (value) => {
		const { provisioner, droplet } = createTestProvisioner({
			credentials: [createTestCredentials({ CONTRAST__INVENTORY__LIBRARY_DIRS: value })],
		});

		expect(() => runPhase(provisioner, droplet, "release")).toThrow(InvalidEnvironmentValueError);
	});

	it("names the offending key", () => {
		const { provisioner, droplet } = createTestProvisioner({
			credentials: [createTestCredentials({ api_key: "k1\nk2" })],
		});

		expect(() => runPhase(provisioner, droplet, "release")).toThrow("Value of CONTRAST__API__API_KEY contains a line break");
	});
});

describe("CLI main", () => {
	const originalEnv = process.env;
	let tempDir: string;
	let stdout: string[];

	beforeEach(() => {
		tempDir = createTempDir();
		process.env = { ...originalEnv };
		delete process.env.PROVISIONER_PHASE;
		delete process.env.JAVA_OPTS;
		delete process.env.VCAP_APPLICATION;
		delete process.env.CONTRAST_SANDBOX_DIR;
		process.env.VCAP_SERVICES = JSON.stringify(createBindingsDocument(createTestCredentials()));
		process.env.CONTRAST_AGENT_VERSION = "3.4.3";

		stdout = [];
		vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
			stdout.push(String(chunk));
			return true;
		});
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		process.env = originalEnv;
		vi.restoreAllMocks();
		cleanupTempDir(tempDir);
	});

	it("runs detect", () => {
		const exitCode = main(["detect", `--app-root=${tempDir}`, "--log-level=silent"]);

		expect(exitCode).toBe(0);
		expect(stdout).toEqual(["contrast-security-agent=3.4.3\n"]);
	});

	it("exits 1 from detect without a bound service", () => {
		process.env.VCAP_SERVICES = "{}";

		const exitCode = main(["detect", `--app-root=${tempDir}`, "--log-level=silent"]);

		expect(exitCode).toBe(1);
		expect(stdout).toEqual([]);
	});

	it("installs the artifact into the sandbox on compile", () => {
		const source = path.join(tempDir, "contrast.jar");
		fs.writeFileSync(source, "agent-bytes");
		const appRoot = path.join(tempDir, "app");

		const exitCode = main([
			"compile",
			`--app-root=${appRoot}`,
			`--artifact-uri=${pathToFileURL(source).href}`,
			"--log-level=silent",
		]);

		expect(exitCode).toBe(0);
		expect(fs.readFileSync(
			path.join(appRoot, ".java-buildpack", "contrast_security_agent", "java-agent-3.4.3.jar"),
			"utf8",
		)).toBe("agent-bytes");
	});

	it("prints release output", () => {
		process.env.VCAP_APPLICATION = "{\"application_name\":\"store-front\"}";

		const exitCode = main(["release", `--app-root=${tempDir}`, "--log-level=silent"]);

		expect(exitCode).toBe(0);
		expect(stdout[0]).toBe("JAVA_OPTS=-javaagent:$PWD/.java-buildpack/contrast_security_agent/java-agent-3.4.3.jar\n");
		expect(stdout[stdout.length - 1]).toBe("CONTRAST__APPLICATION__NAME=store-front\n");
	});

	it("logs a failed phase and exits 1", () => {
		delete process.env.CONTRAST_AGENT_VERSION;

		const exitCode = main(["compile", `--app-root=${tempDir}`, "--log-level=error"]);

		expect(exitCode).toBe(1);
		expect(console.error).toHaveBeenCalledWith(expect.stringContaining("[provisioner] Phase compile failed: No agent version configured"));
	});
});
