import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, test } from "node:test";
import { AccessPolicy } from "../accessPolicy";
import { BluetoothSighting, BluetoothTable } from "../bluetoothTable";
import { ClientRegistry } from "../clientRegistry";
import { loadConfig } from "../config";
import { UnsupportedHostControl } from "../hostControl";
import { Logger } from "../logger";
import { MetricsStore } from "../metricsStore";
import { createProducers } from "../producers";
import { ProducerScheduler } from "../scheduler";
import { SystemSampler } from "../systemSampler";
import {
  BrightnessState,
  DriveActionResult,
  DriveRecord,
  NetworkCounters,
  PushClient,
  UnmountedDrive,
  VolumeState,
  WifiState,
} from "../types";

const configDir = mkdtempSync(join(tmpdir(), "hostlink-producers-"));
after(() => rmSync(configDir, { recursive: true, force: true }));

class FakeClient implements PushClient {
  public readonly frames: string[] = [];
  public readonly remoteAddress = "127.0.0.1";
  public readonly origin = "http://localhost:3000";

  public constructor(
    public readonly id = "c1",
    private readonly hangs = false,
  ) {}

  public send(data: string): Promise<void> {
    this.frames.push(data);
    return this.hangs ? new Promise<void>(() => undefined) : Promise.resolve();
  }

  public events(): unknown[] {
    return this.frames.map((frame) => JSON.parse(frame));
  }
}

class FakeHost extends UnsupportedHostControl {
  public drives: DriveRecord[] = [];
  public unmounted: UnmountedDrive[] = [];
  public readonly mounted: string[] = [];
  public sightings: BluetoothSighting[] = [];
  public brightness: BrightnessState = { available: true, brightness: 70 };
  public volume: VolumeState = { available: true, volume: 40, muted: false };
  public wifi: WifiState | null = null;

  public constructor() {
    super("Test");
  }

  public override async listDrives(): Promise<DriveRecord[] | null> {
    return this.drives.map((drive) => ({ ...drive }));
  }

  public override async listUnmountedDrives(): Promise<UnmountedDrive[] | null> {
    return this.unmounted;
  }

  public override async mountDrive(device: string): Promise<DriveActionResult> {
    this.mounted.push(device);
    this.unmounted = this.unmounted.filter((drive) => drive.deviceNode !== device);
    this.drives = [...this.drives, stick(device)];
    return { success: true, mountPoint: "/media/STICK", message: "Mounted at /media/STICK" };
  }

  public override async getBrightness(): Promise<BrightnessState> {
    return this.brightness;
  }

  public override async getVolume(): Promise<VolumeState> {
    return this.volume;
  }

  public override async getWifi(): Promise<WifiState> {
    return this.wifi ?? super.getWifi();
  }

  public override async scanBluetooth(): Promise<BluetoothSighting[]> {
    return this.sightings;
  }

  public override async getNetworkCounters(): Promise<NetworkCounters | null> {
    return { sent: 100, received: 200 };
  }
}

function stick(deviceNode: string): DriveRecord {
  return { deviceNode, name: "STICK", sizeGb: 8, mountPoints: [], files: [] };
}

const fakeOs = {
  cpus: () => [{ model: "Test CPU", speed: 1000, times: { user: 10, nice: 0, sys: 10, idle: 80, irq: 0 } }],
  totalmem: () => 8 * 1024 ** 3,
  freemem: () => 2 * 1024 ** 3,
  hostname: () => "testhost",
  platform: (): NodeJS.Platform => "linux",
  arch: () => "x64",
  release: () => "6.0.0",
};

const HOME_WIFI: WifiState = { available: true, connected: true, ssid: "HomeNet", signalStrength: 80, scan: [] };

function setup(env: Record<string, string> = {}) {
  const { config } = loadConfig(configDir, { HOSTLINK_CONFIG: join(configDir, "agent.config.json"), ...env });
  const logger = new Logger(false);
  const store = new MetricsStore();
  const registry = new ClientRegistry(logger);
  const host = new FakeHost();
  const policy = new AccessPolicy(
    {
      originsUrl: "https://registry.test/allowed.json",
      baselineOrigins: ["https://turbowarp.org"],
      loopbackBypass: true,
      fetchTimeoutMs: 1_000,
      fetchImpl: async () => new Response(JSON.stringify({ origins: ["https://remote.test"] }), { status: 200 }),
    },
    logger,
  );
  let clock = 1_000;

  const { producers, driveMonitor } = createProducers({
    config,
    store,
    registry,
    host,
    sampler: new SystemSampler(fakeOs),
    bluetooth: new BluetoothTable(),
    policy,
    logger,
    now: () => clock,
  });

  const run = async (name: string): Promise<void> => {
    const producer = producers.find((candidate) => candidate.name === name);
    assert.ok(producer, `producer ${name} exists`);
    await producer.run({ signal: new AbortController().signal });
  };

  const setClock = (value: number): void => {
    clock = value;
  };

  return { config, store, registry, host, policy, producers, driveMonitor, run, setClock, logger };
}

test("every producer claims its own metrics categories", () => {
  const { store, producers } = setup();

  assert.deepEqual(
    producers.map((producer) => producer.name),
    ["system", "disk", "battery", "controls", "wifi", "bluetooth", "drive-monitor", "drives-periodic", "origins"],
  );
  assert.equal(store.ownerOf("cpu"), "system");
  assert.equal(store.ownerOf("network"), "system");
  assert.equal(store.ownerOf("volume"), "controls");
  assert.equal(store.ownerOf("drives"), "drive-monitor");
  assert.equal(store.ownerOf("bluetooth"), "bluetooth");
});

test("the system producer stores samples and broadcasts the snapshot", async () => {
  const { store, registry, run } = setup();
  const client = new FakeClient();
  registry.register(client);

  await run("system");

  assert.deepEqual(store.get("memory"), { value: { total: 8 * 1024 ** 3, used: 6 * 1024 ** 3, percent: 75 }, updatedAt: 1_000 });
  assert.deepEqual(store.get("network"), { value: { sent: 100, received: 200 }, updatedAt: 1_000 });
  assert.deepEqual(client.events(), [{ cmd: "metrics_update", val: store.snapshot() }]);
});

test("a client that never acknowledges does not stall a producer cycle", async () => {
  const { registry, producers, logger } = setup();
  const stuck = new FakeClient("stuck", true);
  const fast = new FakeClient("fast");
  registry.register(stuck);
  registry.register(fast);

  const scheduler = new ProducerScheduler(registry, logger);
  const system = producers.find((producer) => producer.name === "system");
  assert.ok(system);
  scheduler.register(system);

  assert.equal(await scheduler.runOnce("system"), "completed");
  assert.equal(fast.frames.length, 1);
  assert.equal(stuck.frames.length, 1);
});

test("a failed control refresh keeps the last good value and its timestamp", async () => {
  const { host, store, run, setClock } = setup();

  await run("controls");
  assert.deepEqual(store.get("brightness"), { value: { available: true, brightness: 70 }, updatedAt: 1_000 });

  setClock(2_000);
  host.brightness = { available: false, brightness: 0, error: "Command timeout (5s)" };
  host.volume = { available: true, volume: 45, muted: false };
  await run("controls");

  assert.deepEqual(store.get("brightness"), { value: { available: true, brightness: 70 }, updatedAt: 1_000 });
  assert.deepEqual(store.get("volume"), { value: { available: true, volume: 45, muted: false }, updatedAt: 2_000 });
});

test("an unavailable control is stored when nothing better is known", async () => {
  const { host, store, run } = setup();
  host.volume = { available: false, volume: 0, muted: true, error: "No audio control available" };

  await run("controls");

  assert.deepEqual(store.get("volume"), {
    value: { available: false, volume: 0, muted: true, error: "No audio control available" },
    updatedAt: 1_000,
  });
});

test("the bluetooth producer merges scan results and broadcasts the device list", async () => {
  const { host, store, registry, run } = setup();
  const client = new FakeClient();
  registry.register(client);
  host.sightings = [{ address: "aa:bb:cc:dd:ee:01", name: "Speaker", rssi: -40 }];

  await run("bluetooth");

  const device = {
    address: "AA:BB:CC:DD:EE:01",
    name: "Speaker",
    rssi: -40,
    paired: false,
    connected: false,
    nearby: true,
    lastSeen: 1_000,
  };
  assert.deepEqual(store.get("bluetooth").value, [device]);
  assert.deepEqual(client.events(), [
    { cmd: "bluetooth_update", val: { bluetooth: { devices: [device], count: 1, timestamp: 1_000 } } },
  ]);
});

test("a joining client gets the initial drive list and later periodic broadcasts", async () => {
  const { host, registry, run } = setup();
  const drive = stick("/dev/sdb");
  host.drives = [drive];

  const client = new FakeClient();
  await run("drives-periodic");
  registry.register(client);
  await run("drive-monitor");
  await run("drives-periodic");

  assert.deepEqual(client.events(), [
    { cmd: "drives_update", val: { drives: [drive], change_type: "initial" } },
    { cmd: "drives_update", val: { drives: [drive], change_type: "periodic" } },
  ]);
});

test("the initial drive list reaches only the client that joined", async () => {
  const { host, registry, run } = setup();
  host.drives = [stick("/dev/sdb")];

  const first = new FakeClient("first");
  registry.register(first);
  await run("drive-monitor");

  const second = new FakeClient("second");
  registry.register(second);
  await run("drive-monitor");

  assert.equal(first.frames.length, 1);
  assert.deepEqual(second.events(), [
    { cmd: "drives_update", val: { drives: [stick("/dev/sdb")], change_type: "initial" } },
  ]);
});

test("the drive monitor mounts newly attached volumes before listing", async () => {
  const { host, store, run } = setup();
  host.unmounted = [{ deviceNode: "/dev/sdc1", name: "STICK", filesystem: "vfat", sizeGb: 8 }];

  await run("drive-monitor");

  assert.deepEqual(host.mounted, ["/dev/sdc1"]);
  assert.deepEqual(
    store.get("drives").value?.map((drive) => drive.deviceNode),
    ["/dev/sdc1"],
  );
});

test("auto-mount can be disabled", async () => {
  const { host, run } = setup({ HOSTLINK_AUTO_MOUNT: "false" });
  host.unmounted = [{ deviceNode: "/dev/sdc1", name: "STICK", filesystem: "vfat", sizeGb: 8 }];

  await run("drive-monitor");

  assert.deepEqual(host.mounted, []);
});

test("the wifi producer broadcasts the provider state with its timestamp", async () => {
  const { registry, run } = setup();
  const client = new FakeClient();
  registry.register(client);

  await run("wifi");

  assert.deepEqual(client.events(), [
    {
      cmd: "wifi_update",
      val: {
        wifi: { available: false, connected: false, ssid: null, signalStrength: 0, scan: [], error: "Not supported on Test" },
        timestamp: 1_000,
      },
    },
  ]);
});

test("a failed wifi refresh neither replaces the cached state nor broadcasts", async () => {
  const { host, store, registry, run, setClock } = setup();
  const client = new FakeClient();
  registry.register(client);

  host.wifi = HOME_WIFI;
  await run("wifi");

  setClock(2_000);
  host.wifi = null;
  await run("wifi");

  assert.deepEqual(store.get("wifi"), { value: HOME_WIFI, updatedAt: 1_000 });
  assert.deepEqual(client.events(), [{ cmd: "wifi_update", val: { wifi: HOME_WIFI, timestamp: 1_000 } }]);
});

test("the origins producer refreshes the policy even with no clients", async () => {
  const { config, policy, producers, run } = setup();
  const origins = producers.find((producer) => producer.name === "origins");

  assert.equal(origins?.runWhenIdle, true);
  assert.equal(origins?.intervalMs, config.originsRefreshIntervalMs);
  assert.equal(origins?.startDelayMs, config.originsRefreshIntervalMs);
  assert.equal(origins?.timeoutMs, 10_000);

  await run("origins");
  assert.equal(policy.isPermitted("203.0.113.5", "https://remote.test"), true);
});
