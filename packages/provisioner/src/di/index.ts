/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory, type Resolver } from "./container.js";
export {
	APPLICATION_DETAILS,
	ARTIFACT_INSTALLER,
	CONFIG,
	DROPLET,
	ENVIRONMENT_BUILDER,
	LOGGER,
	LOGGER_FACTORY,
	PROVISIONER,
	SERVICE_BINDINGS,
	TOKENS,
	VERSION_RESOLVER,
	createToken,
	type LoggerFactory,
	type Token,
} from "./tokens.js";
export { configureContainer, createProvisioner, createProvisionerContainer } from "./composition-root.js";
