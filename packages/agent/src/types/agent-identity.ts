/**
 * Identity and connection settings of the agent, read from its configuration file.
 * Created once at startup and frozen.
 */
export interface AgentIdentity {
	readonly clusterUUID: string;
	readonly systemID: string;
	readonly sharedSecret: string;
	/** Controller hosts in order of preference. Never empty. */
	readonly controllerEndpoints: readonly [string, ...string[]];
}
