import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { POWER_STATE, type PowerAction } from "@maas-agent/shared";
import type { Logger, PowerDriver, PowerParameters } from "../types/index.js";

/**
 * Runs an executable and resolves with its standard output.
 */
export type ExecFile = (
	file: string,
	args: readonly string[],
	options: { timeout: number },
) => Promise<{ stdout: string }>;

const execFileAsync: ExecFile = async (file, args, options) => {
	const { stdout } = await promisify(execFile)(file, args, { ...options, encoding: "utf8" });
	return { stdout };
};

/** Upper bound for a single power driver invocation */
const POWER_COMMAND_TIMEOUT_MS = 120_000;

function optionArgs(options: Record<string, string>): string[] {
	return Object.keys(options)
		.sort()
		.flatMap(key => [`--${key}`, options[key]]);
}

/**
 * Power driver backed by an external command:
 * `<command> <action> <driver-type> [--<key> <value>]...`
 */
export class CommandPowerDriver implements PowerDriver {
	constructor(
		private readonly command: string,
		private readonly logger: Logger,
		private readonly exec: ExecFile = execFileAsync,
	) {}

	async power(action: PowerAction, params: PowerParameters): Promise<string> {
		const args = [action, params.driverType, ...optionArgs(params.driverOptions)];
		this.logger.debug(`Running power ${action}`, { driver: params.driverType });
		const { stdout } = await this.exec(this.command, args, { timeout: POWER_COMMAND_TIMEOUT_MS });
		const state = stdout.trim();
		return state === "" ? POWER_STATE.UNKNOWN : state;
	}

	async setBootOrder(params: PowerParameters, netboot: boolean): Promise<void> {
		const args = [
			"set-boot-order",
			params.driverType,
			"--netboot",
			String(netboot),
			...optionArgs(params.driverOptions),
		];
		this.logger.debug("Switching boot order", { driver: params.driverType, netboot });
		await this.exec(this.command, args, { timeout: POWER_COMMAND_TIMEOUT_MS });
	}
}
