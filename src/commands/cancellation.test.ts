import { EventEmitter } from "node:events";
import { describe, expect, it } from "vitest";
import { runCancellable } from "./cancellation.js";

function untilAborted(signal: AbortSignal): Promise<never> {
	return new Promise((_, reject) => {
		signal.addEventListener("abort", () => reject(signal.reason), { once: true });
	});
}

describe("runCancellable", () => {
	it("returns the operation's value", async () => {
		const source = new EventEmitter();

		await expect(runCancellable(source, undefined, async () => 42)).resolves.toEqual({
			status: "completed",
			value: 42,
		});
		expect(source.listenerCount("SIGINT")).toBe(0);
		expect(source.listenerCount("SIGTERM")).toBe(0);
	});

	it("aborts on SIGTERM", async () => {
		const source = new EventEmitter();

		const outcome = runCancellable(source, undefined, (signal) => {
			queueMicrotask(() => source.emit("SIGTERM", "SIGTERM"));
			return untilAborted(signal);
		});

		await expect(outcome).resolves.toEqual({ status: "aborted", reason: "Interrupted by SIGTERM" });
		expect(source.listenerCount("SIGTERM")).toBe(0);
	});

	it("aborts when the timeout passes", async () => {
		const outcome = await runCancellable(new EventEmitter(), 10, untilAborted);
		expect(outcome).toEqual({ status: "aborted", reason: "Run timed out after 10ms" });
	});

	it("lets other failures through", async () => {
		await expect(
			runCancellable(new EventEmitter(), undefined, async () => {
				throw new Error("lock held");
			}),
		).rejects.toThrow("lock held");
	});
});
