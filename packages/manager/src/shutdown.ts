import type { SignalSource } from "./types/index.js";

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * The part of `process` that delivers signals.
 */
export interface SignalTarget {
	on(signal: NodeJS.Signals, listener: SignalListener): unknown;
	off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

/**
 * Signal source backed by the current process.
 */
export class ProcessSignalSource implements SignalSource {
	constructor(private readonly target: SignalTarget = process) {}

	onShutdown(listener: SignalListener): () => void {
		for (const signal of SHUTDOWN_SIGNALS) {
			this.target.on(signal, listener);
		}
		return () => {
			for (const signal of SHUTDOWN_SIGNALS) {
				this.target.off(signal, listener);
			}
		};
	}
}
