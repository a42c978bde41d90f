import { createEvent } from "../../shared/src/contracts";
import { AccessPolicy } from "./accessPolicy";
import { BluetoothTable } from "./bluetoothTable";
import { ClientRegistry } from "./clientRegistry";
import { DriveAutoMounter, DriveMonitor, mountedDevices } from "./driveMonitor";
import { attachListings } from "./fsListing";
import { HostControl } from "./hostControl";
import { Logger } from "./logger";
import { MetricsStore } from "./metricsStore";
import { Producer } from "./scheduler";
import { SystemSampler } from "./systemSampler";
import { AgentConfig, ProducerTiming } from "./types";

export interface ProducerDeps {
  config: AgentConfig;
  store: MetricsStore;
  registry: ClientRegistry;
  host: HostControl;
  sampler: SystemSampler;
  bluetooth: BluetoothTable;
  policy: AccessPolicy;
  logger: Logger;
  now?: () => number;
}

export interface AgentProducers {
  producers: Producer[];
  driveMonitor: DriveMonitor;
}

/**
 * Builds every background producer and claims its metrics categories.
 * Also hooks the drive monitor's initial broadcast to client joins.
 */
export function createProducers(deps: ProducerDeps): AgentProducers {
  const { config, store, registry, host, sampler, bluetooth, policy, logger } = deps;
  const now = deps.now ?? Date.now;
  const timings = config.producers;

  const systemWriter = store.createWriter("system", ["cpu", "memory", "network"]);
  const diskWriter = store.createWriter("disk", ["disk"]);
  const batteryWriter = store.createWriter("battery", ["battery"]);
  const controlsWriter = store.createWriter("controls", ["brightness", "volume"]);
  const wifiWriter = store.createWriter("wifi", ["wifi"]);
  const bluetoothWriter = store.createWriter("bluetooth", ["bluetooth"]);
  const drivesWriter = store.createWriter("drive-monitor", ["drives"]);

  const driveMonitor = new DriveMonitor(
    async (signal) => {
      const drives = await host.listDrives(signal);
      return drives ? attachListings(drives) : null;
    },
    drivesWriter,
    registry,
    logger.child("drives"),
  );
  registry.onClientJoined((client) => driveMonitor.requestInitial(client));
  const autoMounter = config.autoMountDrives ? new DriveAutoMounter(host, logger.child("automount")) : null;

  const producers: Producer[] = [
    {
      name: "system",
      ...schedule(timings.system),
      run: async () => {
        const at = now();
        systemWriter.set("cpu", { percent: sampler.sampleCpu() }, at);
        systemWriter.set("memory", sampler.sampleMemory(), at);

        const network = await host.getNetworkCounters();
        if (network) {
          systemWriter.set("network", network, at);
        }

        void registry.broadcast(createEvent("metrics_update", store.snapshot()));
      },
    },
    {
      name: "disk",
      ...schedule(timings.disk),
      run: async () => {
        diskWriter.set("disk", await sampler.sampleDisk(), now());
      },
    },
    {
      name: "battery",
      ...schedule(timings.battery),
      run: async () => {
        const battery = await host.getBattery();
        if (battery) {
          batteryWriter.set("battery", battery, now());
        }
      },
    },
    {
      name: "controls",
      ...schedule(timings.controls),
      run: async () => {
        const [brightness, volume] = await Promise.all([host.getBrightness(), host.getVolume()]);
        const at = now();
        if (keepsLastGood(brightness, store.get("brightness").value)) {
          logger.debug(`Brightness refresh failed: ${brightness.error ?? "unavailable"}`);
        } else {
          controlsWriter.set("brightness", brightness, at);
        }
        if (keepsLastGood(volume, store.get("volume").value)) {
          logger.debug(`Volume refresh failed: ${volume.error ?? "unavailable"}`);
        } else {
          controlsWriter.set("volume", volume, at);
        }
      },
    },
    {
      name: "wifi",
      ...schedule(timings.wifi),
      run: async ({ signal }) => {
        const wifi = await host.getWifi(signal);
        if (keepsLastGood(wifi, store.get("wifi").value)) {
          logger.debug(`Wi-Fi refresh failed: ${wifi.error ?? "unavailable"}`);
          return;
        }

        const at = now();
        wifiWriter.set("wifi", wifi, at);
        void registry.broadcast(createEvent("wifi_update", { wifi, timestamp: at }));
      },
    },
    {
      name: "bluetooth",
      ...schedule(timings.bluetooth),
      run: async ({ signal }) => {
        const [sightings, paired] = await Promise.all([
          host.scanBluetooth(config.bluetoothScanDurationMs, signal),
          host.listPairedBluetooth(signal),
        ]);
        const at = now();
        bluetooth.upsertScan(sightings, at);
        bluetooth.upsertPaired(paired, at);
        bluetooth.expire(at, config.bluetoothDeviceTtlMs);

        const devices = bluetooth.list();
        bluetoothWriter.set("bluetooth", devices, at);
        void registry.broadcast(
          createEvent("bluetooth_update", { bluetooth: { devices, count: devices.length, timestamp: at } }),
        );
      },
    },
    {
      name: "drive-monitor",
      ...schedule(timings.driveMonitor),
      run: async ({ signal }) => {
        if (autoMounter) {
          await autoMounter.mountNew(mountedDevices(store.get("drives").value ?? []), signal);
        }
        await driveMonitor.poll(signal);
      },
    },
    {
      name: "drives-periodic",
      ...schedule(timings.drivesBroadcast),
      run: async () => {
        const drives = store.get("drives").value;
        if (drives) {
          void registry.broadcast(createEvent("drives_update", { drives, change_type: "periodic" }));
        }
      },
    },
    {
      name: "origins",
      intervalMs: config.originsRefreshIntervalMs,
      timeoutMs: Math.min(config.originsFetchTimeoutMs + 5_000, config.originsRefreshIntervalMs - 1),
      runWhenIdle: true,
      // The agent loads the list once before binding.
      startDelayMs: config.originsRefreshIntervalMs,
      run: async ({ signal }) => {
        await policy.refresh(signal);
      },
    },
  ];

  return { producers, driveMonitor };
}

/**
 * A provider reporting `available: false` does not overwrite a value that
 * was read successfully before.
 */
function keepsLastGood(next: { available: boolean }, current: { available: boolean } | null): boolean {
  return !next.available && current !== null;
}

function schedule(timing: ProducerTiming): Pick<Producer, "intervalMs" | "idleIntervalMs" | "timeoutMs"> {
  return { intervalMs: timing.intervalMs, idleIntervalMs: timing.idleIntervalMs, timeoutMs: timing.timeoutMs };
}
