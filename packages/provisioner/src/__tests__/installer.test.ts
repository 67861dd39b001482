/**
 * Tests for LocalArtifactInstaller
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { LocalArtifactInstaller } from "../installer/index.js";
import { cleanupTempDir, createMockLogger, createTempDir } from "./test-utils.js";

describe("LocalArtifactInstaller", () => {
	let tempDir: string;
	let source: string;

	beforeEach(() => {
		tempDir = createTempDir();
		source = path.join(tempDir, "cache", "contrast-agent.jar");
		fs.mkdirSync(path.dirname(source), { recursive: true });
		fs.writeFileSync(source, "agent-bytes");
	});

	afterEach(() => {
		cleanupTempDir(tempDir);
	});

	it("copies a local path into the destination, creating it", () => {
		const installer = new LocalArtifactInstaller(createMockLogger());
		const destinationDir = path.join(tempDir, "app", ".java-buildpack", "contrast_security_agent");

		const installed = installer.install(source, destinationDir, "contrast-engine-3.4.2.jar");

		expect(installed).toBe(path.join(destinationDir, "contrast-engine-3.4.2.jar"));
		expect(fs.readFileSync(installed, "utf8")).toBe("agent-bytes");
	});

	it("accepts a file:// URI", () => {
		const installer = new LocalArtifactInstaller(createMockLogger());
		const destinationDir = path.join(tempDir, "sandbox");

		const installed = installer.install(pathToFileURL(source).href, destinationDir, "java-agent-3.4.3.jar");

		expect(fs.readFileSync(installed, "utf8")).toBe("agent-bytes");
	});

	it("logs the installed artifact", () => {
		const logger = createMockLogger();
		const installer = new LocalArtifactInstaller(logger);

		installer.install(source, path.join(tempDir, "sandbox"), "java-agent-3.4.3.jar");

		expect(logger.info).toHaveBeenCalledWith(`Installed java-agent-3.4.3.jar from ${source}`);
	});

	it("propagates a missing source unchanged", () => {
		const installer = new LocalArtifactInstaller(createMockLogger());
		const missing = path.join(tempDir, "cache", "absent.jar");

		let caught: unknown;
		try {
			installer.install(missing, path.join(tempDir, "sandbox"), "java-agent-3.4.3.jar");
		} catch (err) {
			caught = err;
		}

		expect(caught).toBeInstanceOf(Error);
		expect(caught instanceof Error && "code" in caught ? caught.code : undefined).toBe("ENOENT");
	});
});
