/**
 * Tests for FailureSignal.
 *
 * Covers:
 * - First delivery wins
 * - Subscribers hear the error at most once
 * - Late subscribers and unsubscribe
 */

import { describe, expect, it, vi } from "vitest";
import { FailureSignal } from "../pool/index.js";

describe("FailureSignal", () => {
	it("should start empty", () => {
		expect(new FailureSignal().peek()).toBeNull();
	});

	it("should keep the first delivered error", () => {
		const signal = new FailureSignal();
		const first = new Error("first");

		expect(signal.deliver(first)).toBe(true);
		expect(signal.deliver(new Error("second"))).toBe(false);
		expect(signal.peek()).toBe(first);
	});

	it("should notify subscribers once", () => {
		const signal = new FailureSignal();
		const listener = vi.fn();
		signal.subscribe(listener);

		signal.deliver(new Error("boom"));
		signal.deliver(new Error("again"));

		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(new Error("boom"));
	});

	it("should notify late subscribers on the next microtask", async () => {
		const signal = new FailureSignal();
		const error = new Error("boom");
		signal.deliver(error);
		const listener = vi.fn();

		signal.subscribe(listener);
		expect(listener).not.toHaveBeenCalled();

		await Promise.resolve();
		expect(listener).toHaveBeenCalledWith(error);
	});

	it("should not notify after unsubscribe", async () => {
		const signal = new FailureSignal();
		const listener = vi.fn();
		const unsubscribe = signal.subscribe(listener);

		unsubscribe();
		signal.deliver(new Error("boom"));
		await Promise.resolve();

		expect(listener).not.toHaveBeenCalled();
	});

	it("should resolve wait with the delivered error", async () => {
		const signal = new FailureSignal();
		const error = new Error("boom");

		const waiting = signal.wait();
		signal.deliver(error);

		await expect(waiting).resolves.toBe(error);
		await expect(signal.wait()).resolves.toBe(error);
	});
});
