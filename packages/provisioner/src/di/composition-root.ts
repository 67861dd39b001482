/**
 * Composition root for the provisioner package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import type { AgentProvisioner, ProvisionerConfig } from "../types/index.js";
import { AgentProvisionerImpl } from "../provisioner.js";
import { createDroplet } from "../droplet/index.js";
import { EnvironmentBuilderImpl } from "../environment/index.js";
import { LocalArtifactInstaller } from "../installer/index.js";
import { LoggerImpl } from "../logger/index.js";
import { ApplicationDetailsImpl, ServiceBindingsImpl } from "../services/index.js";
import { StaticVersionResolver } from "../version/index.js";
import { type Container, type Resolver, createContainer } from "./container.js";
import {
	APPLICATION_DETAILS,
	ARTIFACT_INSTALLER,
	CONFIG,
	DROPLET,
	ENVIRONMENT_BUILDER,
	LOGGER,
	LOGGER_FACTORY,
	type LoggerFactory,
	PROVISIONER,
	SERVICE_BINDINGS,
	VERSION_RESOLVER,
} from "./tokens.js";

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens.
 */
export function configureContainer(container: Container, config: ProvisionerConfig): void {
	container.instance(CONFIG, config);

	container.singleton<LoggerFactory>(LOGGER_FACTORY, () => {
		return (prefix: string) => new LoggerImpl(prefix);
	});

	container.singleton(LOGGER, (c: Resolver) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return factory("provisioner");
	});

	container.singleton(SERVICE_BINDINGS, (c: Resolver) => {
		return ServiceBindingsImpl.fromJson(c.resolve(CONFIG).vcapServices);
	});

	container.singleton(APPLICATION_DETAILS, (c: Resolver) => {
		return ApplicationDetailsImpl.fromJson(c.resolve(CONFIG).vcapApplication);
	});

	container.singleton(DROPLET, (c: Resolver) => {
		const cfg = c.resolve(CONFIG);
		return createDroplet({ root: cfg.appRoot, sandbox: cfg.sandboxDir, javaOpts: cfg.javaOpts });
	});

	container.singleton(VERSION_RESOLVER, (c: Resolver) => {
		const cfg = c.resolve(CONFIG);
		return new StaticVersionResolver(cfg.agentVersion, cfg.artifactUri);
	});

	container.singleton(ARTIFACT_INSTALLER, (c: Resolver) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new LocalArtifactInstaller(factory("installer"));
	});

	container.singleton(ENVIRONMENT_BUILDER, (c: Resolver) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new EnvironmentBuilderImpl(factory("environment"));
	});

	container.singleton(PROVISIONER, (c: Resolver) => {
		return new AgentProvisionerImpl(
			c.resolve(LOGGER),
			c.resolve(SERVICE_BINDINGS),
			c.resolve(APPLICATION_DETAILS),
			c.resolve(DROPLET),
			c.resolve(VERSION_RESOLVER),
			c.resolve(ARTIFACT_INSTALLER),
			c.resolve(ENVIRONMENT_BUILDER),
		);
	});
}

/**
 * Create and configure a container with all dependencies for the given config.
 */
export function createProvisionerContainer(config: ProvisionerConfig): Container {
	const container = createContainer();
	configureContainer(container, config);
	return container;
}

/**
 * Create and return the provisioner from a fully configured container.
 */
export function createProvisioner(config: ProvisionerConfig): AgentProvisioner {
	return createProvisionerContainer(config).resolve(PROVISIONER);
}
