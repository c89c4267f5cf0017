import type { SignalSource } from "../types/index.js";
import type { FailureSignal } from "../pool/index.js";

/** Signals that request a clean shutdown */
export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export type ShutdownOutcome =
	| { kind: "failure"; error: Error }
	| { kind: "signal"; signal: NodeJS.Signals };

/**
 * Wait for the first of two events: the pool's failure signal or a shutdown signal.
 *
 * Whichever comes first settles the wait and detaches the other source, so
 * exactly one of them is ever acted upon.
 */
export function waitForShutdown(
	failureSignal: FailureSignal,
	signals: SignalSource,
): Promise<ShutdownOutcome> {
	return new Promise<ShutdownOutcome>(resolve => {
		let settled = false;

		const onSignal = (signal: NodeJS.Signals): void => {
			settle({ kind: "signal", signal });
		};

		const unsubscribe = failureSignal.subscribe(error => {
			settle({ kind: "failure", error });
		});

		function settle(outcome: ShutdownOutcome): void {
			if (settled) {
				return;
			}
			settled = true;
			unsubscribe();
			for (const signal of SHUTDOWN_SIGNALS) {
				signals.removeListener(signal, onSignal);
			}
			resolve(outcome);
		}

		for (const signal of SHUTDOWN_SIGNALS) {
			signals.on(signal, onSignal);
		}
	});
}
