import { errorMessage } from "../errors.js";
import { formatDuration, log } from "../ui/logger.js";

export type CancellableOutcome<T> =
	| { status: "completed"; value: T }
	| { status: "aborted"; reason: string };

type SignalListener = (signal: NodeJS.Signals) => void;

/** `process`, or any emitter standing in for it */
export interface SignalSource {
	once(event: NodeJS.Signals, listener: SignalListener): unknown;
	removeListener(event: NodeJS.Signals, listener: SignalListener): unknown;
}

const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/**
 * Runs `operation` with a signal that fires on SIGINT, SIGTERM or after
 * `timeoutMs`. A rejection after the signal fired is reported as an abort;
 * any other rejection propagates.
 */
export async function runCancellable<T>(
	source: SignalSource,
	timeoutMs: number | undefined,
	operation: (signal: AbortSignal) => Promise<T>,
): Promise<CancellableOutcome<T>> {
	const controller = new AbortController();

	const onSignal = (signal: NodeJS.Signals): void => {
		log.warn(`Received ${signal}, stopping`);
		controller.abort(new Error(`Interrupted by ${signal}`));
	};
	for (const name of STOP_SIGNALS) source.once(name, onSignal);

	const timer =
		timeoutMs !== undefined
			? setTimeout(() => {
					controller.abort(new Error(`Run timed out after ${formatDuration(timeoutMs)}`));
				}, timeoutMs)
			: undefined;
	timer?.unref();

	try {
		return { status: "completed", value: await operation(controller.signal) };
	} catch (error) {
		if (!controller.signal.aborted) throw error;
		return { status: "aborted", reason: errorMessage(controller.signal.reason) };
	} finally {
		clearTimeout(timer);
		for (const name of STOP_SIGNALS) source.removeListener(name, onSignal);
	}
}
