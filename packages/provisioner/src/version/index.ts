export { compareVersions, parseVersion, shortVersion } from "./tokenized-version.js";
export { selectArtifactName } from "./version-selector.js";
export { StaticVersionResolver } from "./static-version-resolver.js";
