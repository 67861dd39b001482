export { ProvisionerError } from "./provisioner-error.js";
export { MissingCredentialError } from "./missing-credential-error.js";
export { ServiceNotBoundError } from "./service-not-bound-error.js";
export { InvalidVersionError } from "./invalid-version-error.js";
export { MissingVersionError } from "./missing-version-error.js";
export { InvalidServiceBindingsError } from "./invalid-service-bindings-error.js";
export { InvalidApplicationDetailsError } from "./invalid-application-details-error.js";
export { InvalidConfigError } from "./invalid-config-error.js";
export { MissingArtifactUriError } from "./missing-artifact-uri-error.js";
export { InvalidEnvironmentValueError } from "./invalid-environment-value-error.js";
export { UnregisteredDependencyError } from "./unregistered-dependency-error.js";
