/**
 * Injection tokens (identifiers) for all dependencies in the agent package.
 * Uses inversify-style Symbol identifiers for type-safe dependency injection.
 */

import type {
	Agent,
	AgentIdentity,
	AgentSettings,
	ControllerClient,
	ControllerDialer,
	DataConverter,
	HandlerCatalog,
	LogSink,
	Logger,
	PayloadCodec,
	PowerDriver,
	SignalSource,
	WorkerPool,
} from "../types/index.js";
import type { LoggerFactory } from "../logger/index.js";
import type { ResilientConnector } from "../client/index.js";
import type { PoolSupervisor } from "../pool/index.js";
import type { ReadTextFile } from "../config/index.js";

/**
 * Token type for identifying dependencies in the container.
 * Using symbols ensures type safety and avoids string collision.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Token for the environment the settings are read from.
 */
export const ENV = createToken<NodeJS.ProcessEnv>("Env");

export const SETTINGS = createToken<AgentSettings>("AgentSettings");

/**
 * Token for the function reading the configuration file.
 */
export const READ_CONFIG_FILE = createToken<ReadTextFile>("ReadConfigFile");

export const IDENTITY_LOADER = createToken<() => Promise<AgentIdentity>>("IdentityLoader");

// ============================================================================
// Logging
// ============================================================================

export const LOG_SINK = createToken<LogSink>("LogSink");

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

/**
 * Token for the agent's own logger.
 */
export const LOGGER = createToken<Logger>("Logger");

// ============================================================================
// Controller Connection
// ============================================================================

export type CodecFactory = (secret: Uint8Array) => PayloadCodec;
export const CODEC_FACTORY = createToken<CodecFactory>("CodecFactory");

export type DataConverterFactory = (codec: PayloadCodec) => DataConverter;
export const DATA_CONVERTER_FACTORY = createToken<DataConverterFactory>("DataConverterFactory");

export const CONTROLLER_DIALER = createToken<ControllerDialer>("ControllerDialer");

export const CONNECTOR = createToken<ResilientConnector>("Connector");

// ============================================================================
// Worker Pool
// ============================================================================

export const POWER_DRIVER = createToken<PowerDriver>("PowerDriver");

/**
 * Token for the catalog builder. Building is deferred to pool construction so
 * catalog errors surface as pool start failures.
 */
export const HANDLER_CATALOG_FACTORY = createToken<() => HandlerCatalog>("HandlerCatalogFactory");

export type WorkerPoolFactory = (identity: AgentIdentity, client: ControllerClient) => WorkerPool;
export const WORKER_POOL_FACTORY = createToken<WorkerPoolFactory>("WorkerPoolFactory");

export const POOL_SUPERVISOR = createToken<PoolSupervisor>("PoolSupervisor");

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * Token for the emitter of shutdown signals (the process in production).
 */
export const SIGNAL_SOURCE = createToken<SignalSource>("SignalSource");

export const AGENT = createToken<Agent>("Agent");

// ============================================================================
// Token groups for documentation
// ============================================================================

export const TOKENS = {
	ENV,
	SETTINGS,
	READ_CONFIG_FILE,
	IDENTITY_LOADER,
	LOG_SINK,
	LOGGER_FACTORY,
	LOGGER,
	CODEC_FACTORY,
	DATA_CONVERTER_FACTORY,
	CONTROLLER_DIALER,
	CONNECTOR,
	POWER_DRIVER,
	HANDLER_CATALOG_FACTORY,
	WORKER_POOL_FACTORY,
	POOL_SUPERVISOR,
	SIGNAL_SOURCE,
	AGENT,
} as const;
