export { AgentError } from "./agent-error.js";
export { ConfigError } from "./config-error.js";
export { CodecSetupError } from "./codec-setup-error.js";
export { ConnectionError } from "./connection-error.js";
export { PoolStartError } from "./pool-start-error.js";
export { PoolRuntimeFailure } from "./pool-runtime-failure.js";
export {
	ControllerRequestError,
	PayloadDecodeError,
	TaskInputDecodeError,
	UnknownTaskError,
	WorkerDeregisteredError,
} from "./controller-errors.js";
