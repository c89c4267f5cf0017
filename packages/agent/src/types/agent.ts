/**
 * Process exit status returned by the agent.
 * 0 on clean shutdown, 1 on any startup or runtime failure.
 */
export type ExitCode = 0 | 1;

/**
 * Agent process that runs the startup pipeline and supervises the worker pool.
 */
export interface Agent {
	run(): Promise<ExitCode>;
}
