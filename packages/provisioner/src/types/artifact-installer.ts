/**
 * Places an artifact into an installation directory.
 * Failures are fatal and reach the caller unchanged.
 */
export interface ArtifactInstaller {
	install(uri: string, destinationDir: string, fileName: string): string;
}
