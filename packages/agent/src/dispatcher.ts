import {
  BluetoothAction,
  ChannelCommand,
  createEvent,
  DriveAction,
  isChannelCommand,
  parseBluetoothAddress,
  parseDeviceValue,
  parseInboundMessage,
  parsePercent,
  parseRunCommandRequest,
  ServerEvent,
} from "../../shared/src/contracts";
import { BluetoothTable } from "./bluetoothTable";
import { ClientRegistry } from "./clientRegistry";
import { CommandRunner } from "./commandRunner";
import { errorMessage } from "./errors";
import { listDrivesOrCached } from "./driveMonitor";
import { clampBrightness, clampVolume, HostControl } from "./hostControl";
import { Logger } from "./logger";
import { MetricsStore } from "./metricsStore";
import { SystemSampler } from "./systemSampler";
import { BluetoothDeviceRecord, PushClient } from "./types";

const DEFAULT_BRIGHTNESS = 100;
const DEFAULT_VOLUME = 50;

const BLUETOOTH_ACTION_STATUS: Record<BluetoothAction, string> = {
  connect: "connecting",
  disconnect: "disconnecting",
  pair: "pairing",
  unpair: "unpairing",
};

export interface DispatcherDeps {
  registry: ClientRegistry;
  store: MetricsStore;
  host: HostControl;
  sampler: SystemSampler;
  bluetooth: BluetoothTable;
  runner: Pick<CommandRunner, "runShell">;
  bluetoothScanDurationMs: number;
  logger: Logger;
}

interface CommandContext {
  val: unknown;
  reply(event: ServerEvent): Promise<boolean>;
}

type CommandHandler = (context: CommandContext) => Promise<void>;

/**
 * Routes push-channel frames to handlers and sends their replies back to the
 * originating client only.
 *
 * Payloads are validated before any acknowledgement goes out, so a rejected
 * command produces exactly one `error` event.
 */
export class CommandDispatcher {
  private readonly handlers: Record<ChannelCommand, CommandHandler>;

  public constructor(private readonly deps: DispatcherDeps) {
    this.handlers = this.buildHandlers();
  }

  public async handle(client: PushClient, raw: string): Promise<void> {
    const { registry, logger } = this.deps;
    const reply = (event: ServerEvent): Promise<boolean> => registry.sendTo(client, event);

    const parsed = parseInboundMessage(raw);
    if (!parsed.ok) {
      await reply(createEvent("error", { message: parsed.reason }));
      return;
    }

    const { cmd, val } = parsed.message;
    if (!isChannelCommand(cmd)) {
      logger.debug(`Client ${client.id} sent unknown command '${cmd}'.`);
      await reply(createEvent("error", { message: `Unknown command: ${cmd}` }));
      return;
    }

    logger.debug(`Client ${client.id} -> ${cmd}`);
    try {
      await this.handlers[cmd]({ val, reply });
    } catch (error) {
      logger.warn(`Command '${cmd}' from ${client.id} failed: ${errorMessage(error)}`);
      await reply(createEvent("error", { message: errorMessage(error) }));
    }
  }

  private buildHandlers(): Record<ChannelCommand, CommandHandler> {
    const { store, host, sampler, runner } = this.deps;

    return {
      ping: async ({ reply }) => {
        await reply(createEvent("pong", { timestamp: Date.now() }));
      },

      get_metrics: async ({ reply }) => {
        await reply(createEvent("metrics", store.snapshot()));
      },

      get_system_info: async ({ reply }) => {
        await reply(createEvent("system_info", sampler.describe(await host.isBluetoothAvailable())));
      },

      brightness_get: async ({ reply }) => {
        await reply(createEvent("brightness_response", await host.getBrightness()));
      },

      brightness_set: async ({ val, reply }) => {
        const level = clampBrightness(parsePercent(val, "brightness", DEFAULT_BRIGHTNESS));
        await reply(createEvent("brightness_ack", { brightness: level, status: "setting" }));
        await reply(createEvent("brightness_response", await host.setBrightness(level)));
      },

      volume_get: async ({ reply }) => {
        await reply(createEvent("volume_response", await host.getVolume()));
      },

      volume_set: async ({ val, reply }) => {
        const level = clampVolume(parsePercent(val, "volume", DEFAULT_VOLUME));
        await reply(createEvent("volume_ack", { volume: level, status: "setting" }));
        await reply(createEvent("volume_response", await host.setVolume(level)));
      },

      volume_mute: async ({ reply }) => {
        await reply(createEvent("volume_ack", { status: "toggling_mute" }));
        await reply(createEvent("volume_response", await host.toggleMute()));
      },

      wifi_scan: async ({ reply }) => {
        await reply(createEvent("wifi_ack", { status: "scanning" }));
        await reply(createEvent("wifi_response", await host.getWifi()));
      },

      bluetooth_scan: async ({ reply }) => {
        await reply(createEvent("bluetooth_ack", { action: "scan", status: "scanning" }));
        await reply(createEvent("bluetooth_response", { action: "scan", success: true, devices: await this.scanBluetooth() }));
      },

      bluetooth_connect: (context) => this.bluetoothAction("connect", context),
      bluetooth_disconnect: (context) => this.bluetoothAction("disconnect", context),
      bluetooth_pair: (context) => this.bluetoothAction("pair", context),
      bluetooth_unpair: (context) => this.bluetoothAction("unpair", context),

      drives_get: async ({ reply }) => {
        const drives = await listDrivesOrCached(host, store);
        await reply(createEvent("drives_response", { drives }));
      },

      drive_mount: (context) => this.driveAction("mount", context),
      drive_unmount: (context) => this.driveAction("unmount", context),

      run_command: async ({ val, reply }) => {
        const request = parseRunCommandRequest(val);
        await reply(createEvent("run_ack", { command: request.command, status: "running" }));
        await reply(createEvent("run_response", await runner.runShell(request.command, { timeoutMs: request.timeoutMs })));
      },
    };
  }

  private async scanBluetooth(): Promise<BluetoothDeviceRecord[]> {
    const { host, bluetooth, bluetoothScanDurationMs } = this.deps;
    const [sightings, paired] = await Promise.all([
      host.scanBluetooth(bluetoothScanDurationMs),
      host.listPairedBluetooth(),
    ]);

    const now = Date.now();
    bluetooth.upsertScan(sightings, now);
    bluetooth.upsertPaired(paired, now);
    return bluetooth.list();
  }

  private async bluetoothAction(action: BluetoothAction, { val, reply }: CommandContext): Promise<void> {
    const address = parseBluetoothAddress(val);
    await reply(createEvent("bluetooth_ack", { action, address, status: BLUETOOTH_ACTION_STATUS[action] }));

    const result = await this.deps.host.bluetoothAction(action, address);
    await reply(createEvent("bluetooth_response", { action, address, ...result }));
  }

  private async driveAction(action: DriveAction, { val, reply }: CommandContext): Promise<void> {
    const device = parseDeviceValue(val);
    await reply(createEvent("drive_ack", { action, device, status: action === "mount" ? "mounting" : "unmounting" }));

    const { host } = this.deps;
    const result = action === "mount" ? await host.mountDrive(device) : await host.unmountDrive(device);
    await reply(createEvent("drive_response", { ...result, action, device }));
  }
}
