import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { ArtifactInstaller, Logger } from "../types/index.js";

/**
 * Installs an artifact from a local path or `file://` URI, such as a
 * buildpack cache that was populated ahead of staging.
 * Copy failures propagate unchanged.
 */
export class LocalArtifactInstaller implements ArtifactInstaller {
	constructor(private readonly logger: Logger) {}

	install(uri: string, destinationDir: string, fileName: string): string {
		const source = uri.startsWith("file:") ? fileURLToPath(uri) : uri;
		const destination = path.join(destinationDir, fileName);

		fs.mkdirSync(destinationDir, { recursive: true });
		fs.copyFileSync(source, destination);
		this.logger.info(`Installed ${fileName} from ${uri}`);

		return destination;
	}
}
