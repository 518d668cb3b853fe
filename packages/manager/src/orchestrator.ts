import type {
	ArtifactFetcher,
	Logger,
	ManagerSettings,
	Orchestrator,
	SignalSource,
} from "./types/index.js";
import type { InstallerFactory, MonitorFactory } from "./di/tokens.js";
import { DownloadError, describeFatal, exitCodeFor } from "./errors/index.js";
import { detectPlatform } from "./installers/index.js";
import { LoggerImpl } from "./logger/index.js";
import { artifactDestination, artifactUrl, buildServiceDescriptor, resolveAgent } from "./service-descriptor.js";

export interface OrchestratorDependencies {
	settings: ManagerSettings;
	/** Node.js platform identifier (process.platform) */
	hostPlatform: string;
	artifactFetcher: ArtifactFetcher;
	signals: SignalSource;
	createInstaller: InstallerFactory;
	createMonitor: MonitorFactory;
	logger?: Logger;
}

/**
 * Runs the manager: validate, download the agent, install it as a host
 * service, then monitor it until a shutdown signal arrives.
 *
 * Shutdown handlers are installed first, so a signal during installation is
 * observed between phases; in-flight host commands are allowed to finish.
 */
export class OrchestratorImpl implements Orchestrator {
	private readonly logger: Logger;

	constructor(private readonly deps: OrchestratorDependencies) {
		this.logger = deps.logger ?? new LoggerImpl("keeper");
	}

	async run(): Promise<number> {
		const controller = new AbortController();
		let received: NodeJS.Signals | null = null;
		const unsubscribe = this.deps.signals.onShutdown(signal => {
			if (received !== null) {
				return;
			}
			received = signal;
			this.logger.info(`Received ${signal}, shutting down...`);
			controller.abort();
		});
		const stopped = () => this.stopped(received);

		try {
			const { config, secrets } = this.deps.settings;
			const platform = detectPlatform(this.deps.hostPlatform);
			const resolved = resolveAgent(config, secrets, platform);
			const installer = this.deps.createInstaller(platform);
			this.logger.info(`Managing agent '${resolved.agent.name}' on ${platform}`);

			if (controller.signal.aborted) {
				return stopped();
			}
			const artifactPath = await this.deps.artifactFetcher.fetch(
				artifactUrl(config.serverUrl),
				artifactDestination(config.artifactDir, platform),
				controller.signal,
			);

			if (controller.signal.aborted) {
				return stopped();
			}
			const descriptor = buildServiceDescriptor(config, platform, resolved, artifactPath);
			await installer.install(descriptor);

			if (controller.signal.aborted) {
				return stopped();
			}
			const monitor = this.deps.createMonitor(installer, descriptor.name, platform);
			await monitor.run(controller.signal);
			return stopped();
		} catch (err) {
			if (controller.signal.aborted && err instanceof DownloadError) {
				return stopped();
			}
			this.logger.error(describeFatal(err));
			return exitCodeFor(err);
		} finally {
			unsubscribe();
		}
	}

	private stopped(signal: NodeJS.Signals | null): number {
		this.logger.info(`Agent keeper stopped (signal ${signal ?? "none"})`);
		return 0;
	}
}
