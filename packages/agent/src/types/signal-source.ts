/**
 * Emitter of OS signals. The process object satisfies this interface.
 */
export interface SignalSource {
	on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
	removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}
