/**
 * Agent container on top of inversify.
 *
 * Bindings are singletons. The composition root registers its defaults with
 * `singletonIfAbsent`, so anything bound beforehand (a fake dialer, a captured
 * log sink) takes their place.
 */

import "reflect-metadata";
import { Container as InversifyContainer } from "inversify";
import type { Token } from "./tokens.js";

/**
 * Builds a value, resolving its collaborators from the container.
 */
export type Factory<T> = (container: Container) => T;

export interface Container {
	/**
	 * Bind a factory that runs on first resolution only.
	 */
	singleton<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Bind a factory unless the token is already bound.
	 */
	singletonIfAbsent<T>(token: Token<T>, factory: Factory<T>): void;

	/**
	 * Bind an existing value.
	 */
	instance<T>(token: Token<T>, value: T): void;

	/**
	 * @throws Error naming the token when nothing is bound to it.
	 */
	resolve<T>(token: Token<T>): T;

	has<T>(token: Token<T>): boolean;
}

export class ContainerImpl implements Container {
	private readonly inversifyContainer = new InversifyContainer({ defaultScope: "Singleton" });

	singleton<T>(token: Token<T>, factory: Factory<T>): void {
		this.inversifyContainer
			.bind<T>(token)
			.toDynamicValue(() => factory(this))
			.inSingletonScope();
	}

	singletonIfAbsent<T>(token: Token<T>, factory: Factory<T>): void {
		if (!this.has(token)) {
			this.singleton(token, factory);
		}
	}

	instance<T>(token: Token<T>, value: T): void {
		this.inversifyContainer.bind<T>(token).toConstantValue(value);
	}

	resolve<T>(token: Token<T>): T {
		if (!this.has(token)) {
			throw new Error(`Nothing bound to ${token.description ?? token.toString()}`);
		}
		return this.inversifyContainer.get<T>(token);
	}

	has<T>(token: Token<T>): boolean {
		return this.inversifyContainer.isBound(token);
	}
}

export function createContainer(): Container {
	return new ContainerImpl();
}
