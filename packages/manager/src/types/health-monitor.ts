import type { ServiceState } from "@agent-keeper/shared";

/**
 * Result of one monitoring tick.
 */
export interface TickResult {
	state: ServiceState;
	/** Whether a down alert was sent on this tick */
	alerted: boolean;
	/** Whether a recovery notice was sent on this tick */
	recovered: boolean;
}

/**
 * Supervision loop that polls the agent service and alerts on outages.
 */
export interface HealthMonitor {
	tick(): Promise<TickResult>;
	/**
	 * Run ticks until the signal aborts. The signal is checked between ticks;
	 * an abort during the sleep ends the loop without waiting for the interval.
	 */
	run(signal: AbortSignal): Promise<void>;
}
