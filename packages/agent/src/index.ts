/**
 * Agent package public API
 *
 * This module exports the agent, its collaborators and the DI wiring.
 */

// Agent
export { AgentImpl, type AgentDependencies } from "./agent.js";

// Configuration
export { loadAgentIdentity, loadAgentSettings, parseAgentIdentity } from "./config/index.js";
export {
	DEFAULT_CONFIG_PATH,
	DEFAULT_MAX_CONSECUTIVE_POLL_FAILURES,
	DEFAULT_POLL_INTERVAL_MS,
	DEFAULT_RETRY_POLICY,
	ENV_VARS,
} from "./constants.js";

// Collaborators
export { LoggerImpl, createLoggerFactory, type LogLevel, type LoggerFactory } from "./logger/index.js";
export {
	CodecDataConverter,
	EncryptionCodec,
	JsonPayloadConverter,
	createCodecDataConverter,
	createEncryptionCodec,
	fromEncodedPayload,
	toEncodedPayload,
} from "./codec/index.js";
export { ControllerClientImpl, ResilientConnector, dialController, type ConnectorOptions } from "./client/index.js";
export { ExponentialBackoff, RetryExhaustedError, retryWithBackoff } from "./retry/index.js";
export {
	FailureSignal,
	PoolSupervisor,
	WorkerPoolImpl,
	createHandlerCatalog,
	type HandlerCatalogDefinition,
	type WorkerPoolOptions,
} from "./pool/index.js";
export { CommandPowerDriver } from "./power/index.js";
export { createDefaultHandlerCatalog } from "./workflows/index.js";
export { SHUTDOWN_SIGNALS, waitForShutdown, type ShutdownOutcome } from "./lifecycle/index.js";

// Errors
export * from "./errors/index.js";

// Interface types
export type * from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	configureContainer,
	createAgent,
	createAgentContainer,
	createContainer,
	createToken,
	TOKENS,
} from "./di/index.js";
export type { Container, Factory, Token } from "./di/index.js";
