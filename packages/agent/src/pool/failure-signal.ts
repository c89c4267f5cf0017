export type FailureListener = (error: Error) => void;

/**
 * Single-delivery channel for a worker pool's terminal error.
 * The first delivery wins; every subscriber hears it at most once.
 */
export class FailureSignal {
	private error: Error | null = null;
	private readonly listeners = new Set<FailureListener>();

	/**
	 * Deliver the terminal error. Returns false if an error was already delivered.
	 */
	deliver(error: Error): boolean {
		if (this.error !== null) {
			return false;
		}
		this.error = error;
		const listeners = [...this.listeners];
		this.listeners.clear();
		for (const listener of listeners) {
			listener(error);
		}
		return true;
	}

	/**
	 * Non-blocking read of the delivered error.
	 */
	peek(): Error | null {
		return this.error;
	}

	/**
	 * Call the listener once the error is delivered, or on the next microtask if
	 * it already was. The returned function cancels the subscription.
	 */
	subscribe(listener: FailureListener): () => void {
		let active = true;
		const once: FailureListener = (error) => {
			if (active) {
				active = false;
				listener(error);
			}
		};

		const delivered = this.error;
		if (delivered !== null) {
			queueMicrotask(() => once(delivered));
		} else {
			this.listeners.add(once);
		}

		return () => {
			active = false;
			this.listeners.delete(once);
		};
	}

	wait(): Promise<Error> {
		return new Promise(resolve => {
			this.subscribe(resolve);
		});
	}
}
