export { LocalArtifactInstaller } from "./local-artifact-installer.js";
