/**
 * Dependency Injection container implementation using inversify.
 */

import "reflect-metadata";
import { Container as InversifyContainer } from "inversify";
import { UnregisteredDependencyError } from "../errors/index.js";
import type { Token } from "./tokens.js";

/**
 * Read side of the container, handed to factories.
 * Factories resolve their collaborators but never register new ones.
 */
export interface Resolver {
	resolve<T>(token: Token<T>): T;
	has<T>(token: Token<T>): boolean;
}

export type Factory<T> = (resolver: Resolver) => T;

/**
 * Every registration lives for one provisioner run, so there is a single
 * lifecycle: built on first resolution, shared afterwards.
 */
export interface Container extends Resolver {
	singleton<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Register a value built outside the container, such as the loaded config.
	 */
	instance<T>(token: Token<T>, value: T): void;
}

export class ContainerImpl implements Container {
	private readonly bindings = new InversifyContainer({ defaultScope: "Singleton" });

	singleton<T>(token: Token<T>, factory: Factory<T>): void {
		this.bindings.bind<T>(token).toDynamicValue(() => factory(this));
	}

	instance<T>(token: Token<T>, value: T): void {
		this.bindings.bind<T>(token).toConstantValue(value);
	}

	/**
	 * @throws UnregisteredDependencyError if nothing is registered for the token.
	 */
	resolve<T>(token: Token<T>): T {
		if (!this.has(token)) {
			throw new UnregisteredDependencyError(token.description ?? token.toString());
		}
		return this.bindings.get<T>(token);
	}

	has<T>(token: Token<T>): boolean {
		return this.bindings.isBound(token);
	}
}

export function createContainer(): Container {
	return new ContainerImpl();
}
