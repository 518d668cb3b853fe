import { type Platform, SERVICE_STATE, type ServiceState } from "@agent-keeper/shared";
import type { AlertDispatcher, AlertPolicy, HealthMonitor, Logger, ServiceStatusProbe, TickResult } from "./types/index.js";
import { type AlertContext, type AlertMessage, downAlert, recoveryNotice } from "./alerting/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError, sleep } from "./utils/index.js";

export interface HealthMonitorOptions {
	serviceName: string;
	platform: Platform;
	hostname: string;
	intervalMs: number;
	alertPolicy: AlertPolicy;
	notifyOnRecovery: boolean;
}

/**
 * Health monitor that polls the agent service once per interval.
 *
 * Any state other than ACTIVE counts as down, including a status query that
 * failed after its retries. The alerted flag is owned by this instance and
 * only changes inside `tick`.
 */
export class HealthMonitorImpl implements HealthMonitor {
	private readonly logger: Logger;
	private alerted = false;

	constructor(
		private readonly probe: ServiceStatusProbe,
		private readonly alerts: AlertDispatcher,
		private readonly options: HealthMonitorOptions,
		logger?: Logger,
		private readonly delay: (ms: number, signal?: AbortSignal) => Promise<void> = sleep,
		private readonly now: () => Date = () => new Date(),
	) {
		this.logger = logger ?? new LoggerImpl("monitor");
	}

	/**
	 * Whether the current outage has already been alerted.
	 */
	isAlerted(): boolean {
		return this.alerted;
	}

	async tick(): Promise<TickResult> {
		const { serviceName } = this.options;
		const state = await this.observe();

		if (state === SERVICE_STATE.ACTIVE) {
			this.logger.debug(`Service '${serviceName}' is active`);
			const recovered = this.alerted && this.options.notifyOnRecovery;
			if (this.alerted) {
				this.logger.info(`Service '${serviceName}' recovered`);
			}
			this.alerted = false;
			if (recovered) {
				await this.dispatch(recoveryNotice(this.context(state)));
			}
			return { state, alerted: false, recovered };
		}

		const shouldAlert = !this.alerted || this.options.alertPolicy === "every-tick";
		if (!shouldAlert) {
			this.logger.warn(`Service '${serviceName}' is still down (${state}); alert already sent`);
			return { state, alerted: false, recovered: false };
		}

		this.logger.warn(`ALERT: agent service '${serviceName}' is down (${state})`);
		this.alerted = true;
		await this.dispatch(downAlert(this.context(state)));
		return { state, alerted: true, recovered: false };
	}

	async run(signal: AbortSignal): Promise<void> {
		const { serviceName, intervalMs } = this.options;
		this.logger.info(`Starting monitoring for service '${serviceName}' (interval=${intervalMs}ms)`);

		while (!signal.aborted) {
			try {
				await this.tick();
			} catch (err) {
				// A single tick must never end the loop
				this.logger.error(`Unexpected error while monitoring '${serviceName}': ${formatError(err)}`);
			}
			if (signal.aborted) {
				break;
			}
			await this.delay(intervalMs, signal);
		}

		this.logger.info(`Monitoring for service '${serviceName}' stopped`);
	}

	private async observe(): Promise<ServiceState> {
		try {
			return await this.probe.queryStatus(this.options.serviceName);
		} catch (err) {
			this.logger.error(`Status query failed, assuming down: ${formatError(err)}`);
			return SERVICE_STATE.UNKNOWN;
		}
	}

	private async dispatch(message: AlertMessage): Promise<void> {
		await this.alerts.send(message.subject, message.body);
	}

	private context(state: ServiceState): AlertContext {
		return {
			serviceName: this.options.serviceName,
			platform: this.options.platform,
			hostname: this.options.hostname,
			state,
			observedAt: this.now(),
		};
	}
}
