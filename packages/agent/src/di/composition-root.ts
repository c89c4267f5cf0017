/**
 * Composition root for the agent package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import type { Agent } from "../types/index.js";
import { AgentImpl } from "../agent.js";
import { loadAgentIdentity, loadAgentSettings } from "../config/index.js";
import { createLoggerFactory } from "../logger/index.js";
import { createCodecDataConverter, createEncryptionCodec } from "../codec/index.js";
import { ResilientConnector, dialController } from "../client/index.js";
import { PoolSupervisor, WorkerPoolImpl } from "../pool/index.js";
import { CommandPowerDriver } from "../power/index.js";
import { createDefaultHandlerCatalog } from "../workflows/index.js";
import { type Container, createContainer } from "./container.js";
import {
	AGENT,
	CODEC_FACTORY,
	CONNECTOR,
	CONTROLLER_DIALER,
	DATA_CONVERTER_FACTORY,
	ENV,
	HANDLER_CATALOG_FACTORY,
	IDENTITY_LOADER,
	LOGGER,
	LOGGER_FACTORY,
	LOG_SINK,
	POOL_SUPERVISOR,
	POWER_DRIVER,
	READ_CONFIG_FILE,
	SETTINGS,
	SIGNAL_SOURCE,
	WORKER_POOL_FACTORY,
} from "./tokens.js";

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens. Tokens bound before this
 * call keep their binding.
 */
export function configureContainer(container: Container, env: NodeJS.ProcessEnv): void {
	container.singletonIfAbsent(ENV, () => env);

	container.singletonIfAbsent(SETTINGS, (c: Container) => loadAgentSettings(c.resolve(ENV)));

	// Logging
	container.singletonIfAbsent(LOG_SINK, () => (line: string) => {
		process.stderr.write(`${line}\n`);
	});

	container.singletonIfAbsent(LOGGER_FACTORY, (c: Container) => createLoggerFactory({
		level: c.resolve(SETTINGS).logLevel,
		sink: c.resolve(LOG_SINK),
	}));

	container.singletonIfAbsent(LOGGER, (c: Container) => c.resolve(LOGGER_FACTORY)("agent"));

	// Configuration file
	container.singletonIfAbsent(IDENTITY_LOADER, (c: Container) => {
		const { configPath } = c.resolve(SETTINGS);
		const readConfigFile = c.has(READ_CONFIG_FILE) ? c.resolve(READ_CONFIG_FILE) : undefined;
		return () => loadAgentIdentity(configPath, readConfigFile);
	});

	// Controller connection
	container.singletonIfAbsent(CODEC_FACTORY, () => createEncryptionCodec);

	container.singletonIfAbsent(DATA_CONVERTER_FACTORY, () => createCodecDataConverter);

	container.singletonIfAbsent(CONTROLLER_DIALER, () => dialController);

	container.singletonIfAbsent(CONNECTOR, (c: Container) => {
		const settings = c.resolve(SETTINGS);
		return new ResilientConnector(c.resolve(CONTROLLER_DIALER), c.resolve(LOGGER_FACTORY)("connector"), {
			policy: settings.connectRetry,
			failover: settings.connectFailover,
			port: settings.controllerPort,
		});
	});

	// Worker pool
	container.singletonIfAbsent(POWER_DRIVER, (c: Container) => new CommandPowerDriver(
		c.resolve(SETTINGS).powerCommand,
		c.resolve(LOGGER_FACTORY)("power"),
	));

	container.singletonIfAbsent(HANDLER_CATALOG_FACTORY, (c: Container) => {
		const powerDriver = c.resolve(POWER_DRIVER);
		return () => createDefaultHandlerCatalog(powerDriver);
	});

	container.singletonIfAbsent(WORKER_POOL_FACTORY, (c: Container) => {
		const settings = c.resolve(SETTINGS);
		const buildCatalog = c.resolve(HANDLER_CATALOG_FACTORY);
		const logger = c.resolve(LOGGER_FACTORY)("worker-pool");
		return (identity, client) => new WorkerPoolImpl(identity, client, buildCatalog(), logger, {
			pollIntervalMs: settings.pollIntervalMs,
			maxConsecutivePollFailures: settings.maxConsecutivePollFailures,
		});
	});

	container.singletonIfAbsent(POOL_SUPERVISOR, (c: Container) => new PoolSupervisor(
		c.resolve(LOGGER_FACTORY)("pool-supervisor"),
		{ policy: c.resolve(SETTINGS).poolStartRetry },
	));

	// Lifecycle
	container.singletonIfAbsent(SIGNAL_SOURCE, () => process);

	container.singletonIfAbsent(AGENT, (c: Container) => new AgentImpl({
		settings: c.resolve(SETTINGS),
		logger: c.resolve(LOGGER),
		loadIdentity: c.resolve(IDENTITY_LOADER),
		createCodec: c.resolve(CODEC_FACTORY),
		createDataConverter: c.resolve(DATA_CONVERTER_FACTORY),
		connector: c.resolve(CONNECTOR),
		createWorkerPool: c.resolve(WORKER_POOL_FACTORY),
		poolSupervisor: c.resolve(POOL_SUPERVISOR),
		signals: c.resolve(SIGNAL_SOURCE),
	}));
}

/**
 * Create and configure a container with all dependencies for the given environment.
 */
export function createAgentContainer(env: NodeJS.ProcessEnv, container: Container = createContainer()): Container {
	configureContainer(container, env);
	return container;
}

/**
 * Create and return the agent from a fully configured container.
 */
export function createAgent(env: NodeJS.ProcessEnv): Agent {
	return createAgentContainer(env).resolve(AGENT);
}
