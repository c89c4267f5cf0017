/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
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
	TOKENS,
	WORKER_POOL_FACTORY,
	createToken,
	type CodecFactory,
	type DataConverterFactory,
	type Token,
	type WorkerPoolFactory,
} from "./tokens.js";
export { configureContainer, createAgent, createAgentContainer } from "./composition-root.js";
