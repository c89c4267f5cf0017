import { CONTROLLER_PORT } from "@maas-agent/shared";
import type {
	AgentIdentity,
	ControllerClient,
	ControllerDialer,
	DataConverter,
	Logger,
	RetryPolicy,
} from "../types/index.js";
import { ConnectionError } from "../errors/index.js";
import { type Clock, ExponentialBackoff, type RandomSource, RetryExhaustedError, retryWithBackoff } from "../retry/index.js";
import { type Sleep, formatError } from "../utils/index.js";

export interface ConnectorOptions {
	policy: RetryPolicy;
	/** Move on to the next endpoint, with a fresh budget, when one is exhausted. */
	failover?: boolean;
	port?: number;
	clock?: Clock;
	random?: RandomSource;
	sleep?: Sleep;
}

/**
 * Connects to the controller under a bounded exponential backoff.
 */
export class ResilientConnector {
	private readonly port: number;

	constructor(
		private readonly dial: ControllerDialer,
		private readonly logger: Logger,
		private readonly options: ConnectorOptions,
	) {
		this.port = options.port ?? CONTROLLER_PORT;
	}

	/**
	 * Dial the first controller endpoint (or each in turn, with failover),
	 * retrying until success or until the retry budget is spent.
	 *
	 * @throws ConnectionError carrying the last dial error
	 */
	async connect(identity: AgentIdentity, dataConverter: DataConverter): Promise<ControllerClient> {
		const endpoints = this.options.failover
			? identity.controllerEndpoints
			: identity.controllerEndpoints.slice(0, 1);

		let attempts = 0;
		let lastError: unknown = null;
		for (const endpoint of endpoints) {
			const hostPort = `${endpoint}:${this.port}`;
			try {
				// Endpoints are tried one after another, never concurrently
				// eslint-disable-next-line no-await-in-loop
				const client = await this.connectTo(hostPort, dataConverter);
				this.logger.info(`Connected to controller ${hostPort}`);
				return client;
			} catch (err) {
				if (!(err instanceof RetryExhaustedError)) {
					throw err;
				}
				attempts += err.attempts;
				lastError = err.lastError;
				this.logger.warn(`Giving up on controller ${hostPort}`, {
					attempts: err.attempts,
					error: formatError(err.lastError),
				});
			}
		}

		throw new ConnectionError(endpoints.map(endpoint => `${endpoint}:${this.port}`), attempts, lastError);
	}

	private connectTo(hostPort: string, dataConverter: DataConverter): Promise<ControllerClient> {
		const backoff = new ExponentialBackoff(this.options.policy, this.options.clock, this.options.random);
		return retryWithBackoff(
			() => this.dial({ hostPort, logger: this.logger, dataConverter }),
			backoff,
			{
				sleep: this.options.sleep,
				onRetry: (err, attempt, delayMs) => {
					this.logger.warn(`Controller ${hostPort} unavailable, retrying`, {
						attempt,
						delayMs: Math.round(delayMs),
						error: formatError(err),
					});
				},
			},
		);
	}
}
