/**
 * Type definitions for the agent package.
 */
export type { Agent, ExitCode } from "./agent.js";
export type { AgentIdentity } from "./agent-identity.js";
export type { AgentSettings } from "./agent-settings.js";
export type {
	ClaimedTask,
	ControllerClient,
	ControllerDialer,
	DialOptions,
	WorkerRegistration,
} from "./controller-client.js";
export type {
	ActivityHandler,
	HandlerCatalog,
	WorkflowContext,
	WorkflowHandler,
} from "./handler-catalog.js";
export type { LogFields, LogSink, Logger } from "./logger.js";
export type { DataConverter, Payload, PayloadCodec, PayloadConverter } from "./payload.js";
export type { PowerDriver, PowerParameters } from "./power-driver.js";
export type { RetryPolicy } from "./retry-policy.js";
export type { SignalSource } from "./signal-source.js";
export type { WorkerPool, WorkerPoolState } from "./worker-pool.js";
