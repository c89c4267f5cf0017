import type {
	Agent,
	AgentIdentity,
	AgentSettings,
	ControllerClient,
	DataConverter,
	ExitCode,
	Logger,
	PayloadCodec,
	SignalSource,
	WorkerPool,
} from "./types/index.js";
import type { ResilientConnector } from "./client/index.js";
import type { PoolSupervisor } from "./pool/index.js";
import { CodecSetupError, PoolStartError } from "./errors/index.js";
import { waitForShutdown } from "./lifecycle/index.js";
import { errorType, formatError } from "./utils/index.js";
import { ENV_VARS } from "./constants.js";

/**
 * Collaborators of the startup pipeline, in the order they are used.
 */
export interface AgentDependencies {
	settings: AgentSettings;
	logger: Logger;
	loadIdentity: () => Promise<AgentIdentity>;
	createCodec: (secret: Uint8Array) => PayloadCodec;
	createDataConverter: (codec: PayloadCodec) => DataConverter;
	connector: ResilientConnector;
	createWorkerPool: (identity: AgentIdentity, client: ControllerClient) => WorkerPool;
	poolSupervisor: PoolSupervisor;
	signals: SignalSource;
}

/**
 * Agent process: runs the startup pipeline, then supervises the worker pool
 * until it fails or a shutdown signal arrives.
 */
export class AgentImpl implements Agent {
	private readonly logger: Logger;

	constructor(private readonly deps: AgentDependencies) {
		this.logger = deps.logger;
	}

	/**
	 * Every stage must succeed before the next one starts; the first failure
	 * ends the run with exit code 1.
	 */
	async run(): Promise<ExitCode> {
		const { settings } = this.deps;
		if (settings.unknownLogLevel !== null) {
			this.logger.warn("Unknown log level, defaulting to INFO", {
				[ENV_VARS.LOG_LEVEL]: settings.unknownLogLevel,
			});
		}

		let pool: WorkerPool;
		try {
			pool = await this.startUp();
		} catch (err) {
			this.logger.error(`Agent startup failed: ${formatError(err)}`, { errorType: errorType(err) });
			return 1;
		}

		this.logger.info("Service MAAS Agent started");

		const outcome = await waitForShutdown(pool.failureSignal(), this.deps.signals);
		if (outcome.kind === "failure") {
			this.logger.fatal(`Worker pool failure: ${formatError(outcome.error)}`, {
				errorType: errorType(outcome.error),
			});
			return 1;
		}

		this.logger.info(`Received ${outcome.signal}, shutting down`);
		return 0;
	}

	private async startUp(): Promise<WorkerPool> {
		const identity = await this.deps.loadIdentity();
		this.logger.debug("Configuration loaded", {
			systemId: identity.systemID,
			controllers: identity.controllerEndpoints.join(","),
		});

		const dataConverter = this.createDataConverter(identity);
		const client = await this.deps.connector.connect(identity, dataConverter);

		let pool: WorkerPool;
		try {
			pool = this.deps.createWorkerPool(identity, client);
		} catch (err) {
			throw err instanceof PoolStartError
				? err
				: new PoolStartError(`worker pool construction failed: ${formatError(err)}`, { cause: err });
		}

		await this.deps.poolSupervisor.start(pool);
		return pool;
	}

	private createDataConverter(identity: AgentIdentity): DataConverter {
		let codec: PayloadCodec;
		try {
			codec = this.deps.createCodec(Buffer.from(identity.sharedSecret, "utf8"));
		} catch (err) {
			throw err instanceof CodecSetupError
				? err
				: new CodecSetupError(formatError(err), { cause: err });
		}
		return this.deps.createDataConverter(codec);
	}
}
