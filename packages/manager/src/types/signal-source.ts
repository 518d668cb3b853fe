/**
 * Source of process shutdown signals.
 */
export interface SignalSource {
	/**
	 * Subscribe to SIGINT and SIGTERM.
	 * @returns A function that removes the subscription.
	 */
	onShutdown(listener: (signal: NodeJS.Signals) => void): () => void;
}
