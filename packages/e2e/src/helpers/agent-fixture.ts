/**
 * Agent Fixture for E2E Tests
 *
 * Runs the real composition root in process against a controller stub:
 * the agent reads a configuration file from a temp directory, logs into a
 * captured sink and listens for shutdown signals on an emitter the test owns.
 * Every worker pool the agent creates is tracked so teardown can stop it.
 *
 * Usage:
 *   const fixture = createAgentFixture("my-test-suite");
 *
 *   beforeEach(() => fixture.setup());
 *   afterEach(async () => fixture.teardown());
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { EventEmitter } from "node:events";
import {
	type Container,
	ENV_VARS,
	TOKENS,
	WorkerPoolImpl,
	createAgentContainer,
	createContainer,
} from "@maas-agent/agent";
import { TEST_POLL_INTERVAL_MS, TEST_SECRET, TEST_SYSTEM_ID } from "./constants.js";

export interface AgentConfigFile {
	maasUuid?: string;
	systemId?: string;
	secret?: string;
	controllers?: string[];
}

export interface AgentFixture {
	/** Temporary directory of the current test (empty until setup) */
	readonly tempDir: string;
	/** Log lines written by the agent under test */
	readonly logLines: string[];
	/** Shutdown signal emitter handed to the agent */
	readonly signals: EventEmitter;
	/** Worker pools created by the agent under test */
	readonly pools: WorkerPoolImpl[];

	setup(): void;
	teardown(): Promise<void>;

	/** Write the agent configuration file and return its path. */
	writeConfig(config?: AgentConfigFile): string;

	/**
	 * Build the agent container for the given environment.
	 * `prepare` may bind replacements before the composition root runs.
	 */
	buildContainer(env: NodeJS.ProcessEnv, prepare?: (container: Container) => void): Container;

	/** Environment pointing the agent at a local controller port. */
	envFor(configPath: string, controllerPort?: number): NodeJS.ProcessEnv;

	/** Log lines at the given level. */
	linesAt(level: "INFO" | "WARN" | "ERROR" | "FATAL"): string[];
}

function toYaml(config: Required<AgentConfigFile>): string {
	return [
		`maas_uuid: ${JSON.stringify(config.maasUuid)}`,
		`system_id: ${JSON.stringify(config.systemId)}`,
		`secret: ${JSON.stringify(config.secret)}`,
		"controllers:",
		...config.controllers.map(controller => `  - ${JSON.stringify(controller)}`),
		"",
	].join("\n");
}

/**
 * Create an agent fixture for a test suite
 */
export function createAgentFixture(suiteName: string): AgentFixture {
	let tempDir = "";
	const logLines: string[] = [];
	const pools: WorkerPoolImpl[] = [];
	let signals = new EventEmitter();

	return {
		get tempDir() {
			return tempDir;
		},
		logLines,
		get signals() {
			return signals;
		},
		pools,

		setup() {
			tempDir = fs.mkdtempSync(path.join(os.tmpdir(), `e2e-${suiteName}-`));
			logLines.length = 0;
			signals = new EventEmitter();
		},

		async teardown() {
			for (const pool of pools) {
				pool.stop();
				await pool.whenIdle();
			}
			pools.length = 0;
			signals.removeAllListeners();
			if (tempDir) {
				fs.rmSync(tempDir, { recursive: true, force: true });
				tempDir = "";
			}
		},

		writeConfig(config = {}) {
			const configPath = path.join(tempDir, "agent.yaml");
			fs.writeFileSync(configPath, toYaml({
				maasUuid: config.maasUuid ?? "cluster-uuid-1",
				systemId: config.systemId ?? TEST_SYSTEM_ID,
				secret: config.secret ?? TEST_SECRET,
				controllers: config.controllers ?? ["127.0.0.1"],
			}));
			return configPath;
		},

		buildContainer(env, prepare) {
			const container = createContainer();
			container.instance(TOKENS.LOG_SINK, (line: string) => {
				logLines.push(line);
			});
			container.instance(TOKENS.SIGNAL_SOURCE, signals);
			container.singleton(TOKENS.WORKER_POOL_FACTORY, (c: Container) => {
				const settings = c.resolve(TOKENS.SETTINGS);
				const logger = c.resolve(TOKENS.LOGGER_FACTORY)("worker-pool");
				const buildCatalog = c.resolve(TOKENS.HANDLER_CATALOG_FACTORY);
				return (identity, client) => {
					const pool = new WorkerPoolImpl(identity, client, buildCatalog(), logger, {
						pollIntervalMs: settings.pollIntervalMs,
						maxConsecutivePollFailures: settings.maxConsecutivePollFailures,
					});
					pools.push(pool);
					return pool;
				};
			});
			prepare?.(container);
			return createAgentContainer(env, container);
		},

		envFor(configPath, controllerPort) {
			return {
				[ENV_VARS.CONFIG_PATH]: configPath,
				[ENV_VARS.LOG_LEVEL]: "debug",
				[ENV_VARS.POLL_INTERVAL_MS]: String(TEST_POLL_INTERVAL_MS),
				[ENV_VARS.CONTROLLER_PORT]: controllerPort === undefined ? undefined : String(controllerPort),
			};
		},

		linesAt(level) {
			const marker = `[${level.padEnd(5)}]`;
			return logLines.filter(line => line.includes(marker));
		},
	};
}
