/**
 * Dependency Injection container implementation using inversify.
 */

import "reflect-metadata";
import { Container as InversifyContainer } from "inversify";
import type { Token } from "./tokens.js";

/**
 * Factory function type for creating instances.
 */
export type Factory<T> = (container: Container) => T;

/**
 * Container interface for dependency injection.
 */
export interface Container {
	/**
	 * Register a dependency with singleton lifecycle.
	 * The factory is called once, and the same instance is returned for all resolutions.
	 */
	singleton<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Register a pre-created instance as a singleton.
	 */
	instance<T>(token: Token<T>, value: T): void;

	/**
	 * Register a singleton only when nothing is bound to the token yet.
	 * Lets callers substitute host collaborators before the container is configured.
	 */
	singletonIfAbsent<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Resolve a dependency by its token.
	 * @throws Error if the token is not registered.
	 */
	resolve<T>(token: Token<T>): T;

	/**
	 * Check if a token is registered.
	 */
	has<T>(token: Token<T>): boolean;
}

/**
 * Inversify-based DI container implementation.
 * Provides a simplified API wrapping inversify's Container.
 */
export class ContainerImpl implements Container {
	private readonly inversifyContainer: InversifyContainer;

	constructor() {
		this.inversifyContainer = new InversifyContainer({ defaultScope: "Singleton" });
	}

	singleton<T>(token: Token<T>, factory: Factory<T>): void {
		this.inversifyContainer
			.bind<T>(token)
			.toDynamicValue(() => factory(this))
			.inSingletonScope();
	}

	instance<T>(token: Token<T>, value: T): void {
		this.inversifyContainer.bind<T>(token).toConstantValue(value);
	}

	singletonIfAbsent<T>(token: Token<T>, factory: Factory<T>): void {
		if (!this.has(token)) {
			this.singleton(token, factory);
		}
	}

	resolve<T>(token: Token<T>): T {
		if (!this.has(token)) {
			throw new Error(`No registration found for token: ${token.toString()}`);
		}
		return this.inversifyContainer.get<T>(token);
	}

	has<T>(token: Token<T>): boolean {
		return this.inversifyContainer.isBound(token);
	}
}

/**
 * Create a new container instance.
 */
export function createContainer(): Container {
	return new ContainerImpl();
}
