import { AccessPolicy, FetchFn } from "./accessPolicy";
import { BluetoothTable } from "./bluetoothTable";
import { ClientRegistry } from "./clientRegistry";
import { CommandRunner } from "./commandRunner";
import { CommandDispatcher } from "./dispatcher";
import { HostControl, UnsupportedHostControl } from "./hostControl";
import { LinuxHostControl } from "./linuxHostControl";
import { Logger } from "./logger";
import { MacosHostControl } from "./macosHostControl";
import { MetricsStore } from "./metricsStore";
import { createProducers } from "./producers";
import { ProducerScheduler } from "./scheduler";
import { AgentServer, ListeningPorts } from "./server";
import { SystemSampler } from "./systemSampler";
import { AgentConfig } from "./types";

export interface AgentOverrides {
  host?: HostControl;
  sampler?: SystemSampler;
  fetchImpl?: FetchFn;
}

export function selectHostControl(platform: NodeJS.Platform, runner: CommandRunner, config: AgentConfig): HostControl {
  switch (platform) {
    case "linux":
      return new LinuxHostControl(runner, { mountTimeoutMs: config.mountTimeoutMs });
    case "darwin":
      return new MacosHostControl(runner, { mountTimeoutMs: config.mountTimeoutMs });
    default:
      return new UnsupportedHostControl(platform);
  }
}

/**
 * The assembled hub: one store, one registry and one policy shared by the
 * producers, the dispatcher and both listeners.
 */
export class Agent {
  public readonly registry: ClientRegistry;
  public readonly store = new MetricsStore();
  public readonly policy: AccessPolicy;
  public readonly host: HostControl;
  public readonly scheduler: ProducerScheduler;
  public readonly server: AgentServer;

  public constructor(
    private readonly config: AgentConfig,
    private readonly logger: Logger,
    overrides: AgentOverrides = {},
  ) {
    const runner = new CommandRunner(config.commandTimeoutMs, config.maxConcurrentCommands, logger.child("exec"));
    const sampler = overrides.sampler ?? new SystemSampler();
    const bluetooth = new BluetoothTable();

    this.host = overrides.host ?? selectHostControl(process.platform, runner, config);
    this.registry = new ClientRegistry(logger.child("clients"));
    this.policy = new AccessPolicy(
      {
        originsUrl: config.originsUrl,
        baselineOrigins: config.baselineOrigins,
        loopbackBypass: config.loopbackBypass,
        fetchTimeoutMs: config.originsFetchTimeoutMs,
        fetchImpl: overrides.fetchImpl,
      },
      logger.child("policy"),
    );

    const dispatcher = new CommandDispatcher({
      registry: this.registry,
      store: this.store,
      host: this.host,
      sampler,
      bluetooth,
      runner,
      bluetoothScanDurationMs: config.bluetoothScanDurationMs,
      logger: logger.child("dispatch"),
    });

    const { producers } = createProducers({
      config,
      store: this.store,
      registry: this.registry,
      host: this.host,
      sampler,
      bluetooth,
      policy: this.policy,
      logger,
    });

    this.scheduler = new ProducerScheduler(this.registry, logger.child("scheduler"));
    producers.forEach((producer) => this.scheduler.register(producer));

    this.server = new AgentServer({
      config,
      policy: this.policy,
      registry: this.registry,
      dispatcher,
      store: this.store,
      host: this.host,
      sampler,
      runner,
      logger: logger.child("server"),
      fetchImpl: overrides.fetchImpl,
    });
  }

  /**
   * Loads the remote origin list once, binds both listeners and starts the
   * producers. Rejects when a listener cannot bind.
   */
  public async start(): Promise<ListeningPorts> {
    this.logger.info(`Host control provider: ${this.host.platformName}`);

    const loaded = await this.policy.refresh();
    if (!loaded) {
      this.logger.warn(`Origin registry unavailable; continuing with ${this.policy.origins.length} baseline origins.`);
    }

    const ports = await this.server.start();
    this.scheduler.start();
    return ports;
  }

  public async stop(): Promise<void> {
    this.scheduler.stop();
    await this.server.stop();
  }
}
