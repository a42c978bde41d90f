import { readdir, stat } from "fs/promises";
import { join } from "path";
import { BluetoothAction } from "../../shared/src/contracts";
import { BluetoothSighting, PairedDevice } from "./bluetoothTable";
import {
  clampBrightness,
  clampVolume,
  CommandExecutor,
  failureText,
  HostControl,
  rankNetworks,
  rssiToQuality,
  unavailableWifi,
} from "./hostControl";
import {
  BatteryState,
  BluetoothActionResult,
  BrightnessState,
  ControlResult,
  DriveActionResult,
  DriveRecord,
  NetworkCounters,
  UnmountedDrive,
  VolumeState,
  WifiNetwork,
  WifiState,
} from "./types";

export interface MacosHostOptions {
  mountTimeoutMs: number;
  volumesRoot?: string;
  wifiInterface?: string;
}

const AIRPORT =
  "/System/Library/PrivateFrameworks/Apple80211.framework/Versions/Current/Resources/airport";

const SYSTEM_VOLUMES = new Set(["Macintosh HD", "System", "Data", "Preboot", "Recovery", "VM"]);

/**
 * macOS provider backed by osascript, brightness, airport, networksetup,
 * blueutil, diskutil, df, pmset and netstat.
 */
export class MacosHostControl implements HostControl {
  public readonly platformName = "macOS";
  private readonly volumesRoot: string;
  private readonly wifiInterface: string;

  public constructor(
    private readonly runner: CommandExecutor,
    private readonly options: MacosHostOptions,
  ) {
    this.volumesRoot = options.volumesRoot ?? "/Volumes";
    this.wifiInterface = options.wifiInterface ?? "en0";
  }

  public async getBrightness(): Promise<BrightnessState> {
    const result = await this.runner.run(["brightness", "-l"]);
    const brightness = result.success ? parseBrightnessList(result.stdout ?? "") : null;
    if (brightness === null) {
      return {
        available: false,
        brightness: 0,
        error: "Brightness control requires the 'brightness' command line tool.",
      };
    }
    return { available: true, brightness };
  }

  public async setBrightness(level: number): Promise<ControlResult> {
    const brightness = clampBrightness(level);
    const result = await this.runner.run(["brightness", (brightness / 100).toFixed(2)]);
    if (!result.success) {
      return { success: false, error: failureText(result, "Brightness control failed") };
    }
    return { success: true, brightness };
  }

  public async getVolume(): Promise<VolumeState> {
    const result = await this.runner.run(["osascript", "-e", "get volume settings"]);
    const parsed = result.success ? parseVolumeSettings(result.stdout ?? "") : null;
    if (!parsed) {
      return { available: false, volume: 0, muted: true, error: failureText(result, "Volume control not available") };
    }
    return { available: true, ...parsed };
  }

  public async setVolume(level: number): Promise<ControlResult> {
    const volume = clampVolume(level);
    const result = await this.runner.run(["osascript", "-e", `set volume output volume ${volume}`]);
    if (!result.success) {
      return { success: false, error: failureText(result, "Volume set failed") };
    }
    return { success: true, volume };
  }

  public async toggleMute(): Promise<ControlResult> {
    const current = await this.getVolume();
    if (!current.available) {
      return { success: false, error: current.error ?? "Mute toggle failed" };
    }

    const muted = !current.muted;
    const result = await this.runner.run(["osascript", "-e", `set volume output muted ${muted}`]);
    if (!result.success) {
      return { success: false, error: failureText(result, "Mute toggle failed") };
    }
    return { success: true, muted };
  }

  public async getWifi(signal?: AbortSignal): Promise<WifiState> {
    const [info, network, scan] = await Promise.all([
      this.runner.run([AIRPORT, "-I"], { signal }),
      this.runner.run(["networksetup", "-getairportnetwork", this.wifiInterface], { signal }),
      this.runner.run([AIRPORT, "-s"], { signal, timeoutMs: 7_000 }),
    ]);

    const current = info.success ? parseAirportInfo(info.stdout ?? "") : null;
    const ssid = current?.ssid ?? (network.success ? parseAirportNetwork(network.stdout ?? "") : null);

    if (!info.success && !network.success) {
      return unavailableWifi(failureText(network, "Wi-Fi information not available"));
    }

    const nearby = scan.success ? parseAirportScan(scan.stdout ?? "", ssid) : [];
    return {
      available: true,
      connected: ssid !== null,
      ssid,
      signalStrength: current?.signalStrength ?? (ssid ? 50 : 0),
      scan: rankNetworks(nearby),
    };
  }

  public async isBluetoothAvailable(): Promise<boolean> {
    const result = await this.runner.run(["blueutil", "--power"]);
    return result.success && (result.stdout ?? "").trim() === "1";
  }

  public async scanBluetooth(durationMs: number, signal?: AbortSignal): Promise<BluetoothSighting[]> {
    const seconds = Math.max(1, Math.ceil(durationMs / 1000));
    const result = await this.runner.run(["blueutil", "--format", "json", "--inquiry", String(seconds)], {
      timeoutMs: seconds * 1000 + 2_000,
      signal,
    });
    if (!result.success) {
      return [];
    }
    return parseBlueutilDevices(result.stdout ?? "").map(({ address, name, rssi, connected }) => ({
      address,
      name,
      rssi,
      connected,
    }));
  }

  public async listPairedBluetooth(signal?: AbortSignal): Promise<PairedDevice[]> {
    const result = await this.runner.run(["blueutil", "--format", "json", "--paired"], { signal });
    if (!result.success) {
      return [];
    }
    return parseBlueutilDevices(result.stdout ?? "").map(({ address, name, connected }) => ({
      address,
      name,
      connected,
    }));
  }

  public async bluetoothAction(action: BluetoothAction, address: string): Promise<BluetoothActionResult> {
    const result = await this.runner.run(["blueutil", `--${action}`, address], { timeoutMs: 20_000 });
    if (!result.success) {
      return { success: false, error: failureText(result, `Bluetooth ${action} failed`) };
    }
    return { success: true, message: `Bluetooth ${action} ${address} done` };
  }

  /**
   * A volume whose `df` or `diskutil` run fails makes the whole scan fail, so
   * a flaky tool never changes a drive's identifier between polls.
   */
  public async listDrives(signal?: AbortSignal): Promise<DriveRecord[] | null> {
    let names: string[];
    try {
      names = await readdir(this.volumesRoot);
    } catch {
      return null;
    }

    const drives: DriveRecord[] = [];
    for (const name of names) {
      if (name.startsWith(".") || SYSTEM_VOLUMES.has(name)) {
        continue;
      }

      const volumePath = join(this.volumesRoot, name);
      if (!(await isDirectory(volumePath))) {
        continue;
      }

      const [df, info] = await Promise.all([
        this.runner.run(["df", "-k", volumePath], { signal }),
        this.runner.run(["diskutil", "info", volumePath], { signal }),
      ]);
      if (!df.success || !info.success) {
        return null;
      }

      const usage = parseDfRow(df.stdout ?? "");
      const details = parseDiskutilInfo(info.stdout ?? "");
      const deviceNode = usage?.device ?? details.deviceNode ?? `/dev/disk_for_${name}`;

      drives.push({
        deviceNode,
        name,
        sizeGb: usage?.sizeGb ?? 0,
        mountPoints: [
          {
            device: deviceNode,
            mountPoint: volumePath,
            mountName: name,
            filesystem: details.filesystem ?? "unknown",
          },
        ],
        files: [],
      });
    }

    return drives;
  }

  /**
   * External volumes are mounted by the system as soon as they attach.
   */
  public async listUnmountedDrives(): Promise<UnmountedDrive[] | null> {
    return [];
  }

  public async mountDrive(device: string): Promise<DriveActionResult> {
    const result = await this.runner.run(["diskutil", "mount", device], { timeoutMs: this.options.mountTimeoutMs });
    if (!result.success) {
      return { success: false, error: failureText(result, "Mount failed") };
    }

    const match = /mounted at (.+)$/im.exec(result.stdout ?? "");
    if (!match) {
      return { success: true, message: "Drive mounted successfully" };
    }
    const mountPoint = match[1].trim();
    return { success: true, mountPoint, message: `Mounted at ${mountPoint}` };
  }

  public async unmountDrive(device: string): Promise<DriveActionResult> {
    const result = await this.runner.run(["diskutil", "unmount", device], { timeoutMs: this.options.mountTimeoutMs });
    if (!result.success) {
      return { success: false, error: failureText(result, "Unmount failed") };
    }
    return { success: true, message: `Safely removed ${device}` };
  }

  public async getBattery(): Promise<BatteryState | null> {
    const result = await this.runner.run(["pmset", "-g", "batt"]);
    return result.success ? parsePmsetBattery(result.stdout ?? "") : null;
  }

  public async getNetworkCounters(): Promise<NetworkCounters | null> {
    const result = await this.runner.run(["netstat", "-ib"]);
    return result.success ? parseNetstatIb(result.stdout ?? "") : null;
  }
}

/**
 * `brightness -l` prints `display 0: brightness 0.750000`.
 */
export function parseBrightnessList(stdout: string): number | null {
  const match = /brightness\s+([0-9.]+)/i.exec(stdout);
  if (!match) {
    return null;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) ? Math.round(value * 100) : null;
}

/**
 * Parses `output volume:50, input volume:75, alert volume:100, output muted:false`.
 */
export function parseVolumeSettings(stdout: string): { volume: number; muted: boolean } | null {
  const volume = /output volume:\s*(\d+)/.exec(stdout);
  if (!volume) {
    return null;
  }
  const muted = /output muted:\s*(true|false)/.exec(stdout);
  return { volume: Number(volume[1]), muted: muted?.[1] === "true" };
}

export function parseAirportInfo(stdout: string): { ssid: string | null; signalStrength: number } | null {
  let ssid: string | null = null;
  let rssi: number | null = null;

  for (const line of stdout.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("SSID:")) {
      ssid = trimmed.slice("SSID:".length).trim() || null;
    } else if (trimmed.startsWith("agrCtlRSSI:")) {
      const value = Number.parseInt(trimmed.slice("agrCtlRSSI:".length), 10);
      rssi = Number.isFinite(value) ? value : null;
    }
  }

  if (ssid === null && rssi === null) {
    return null;
  }
  return { ssid, signalStrength: rssi === null ? 0 : rssiToQuality(rssi) };
}

export function parseAirportNetwork(stdout: string): string | null {
  const prefix = "Current Wi-Fi Network:";
  const line = stdout.split("\n").find((entry) => entry.includes(prefix));
  if (!line) {
    return null;
  }
  const ssid = line.slice(line.indexOf(prefix) + prefix.length).trim();
  return ssid || null;
}

/**
 * Parses `airport -s`. The SSID column is right-aligned and may hold spaces,
 * so columns are read relative to the BSSID.
 */
export function parseAirportScan(stdout: string, connectedSsid: string | null): WifiNetwork[] {
  const networks: WifiNetwork[] = [];
  const row = /^\s*(.*?)\s+([0-9a-f]{2}(?::[0-9a-f]{2}){5})\s+(-?\d+)\s+(\d+)/i;

  for (const line of stdout.split("\n").slice(1)) {
    const match = row.exec(line);
    if (!match) {
      continue;
    }

    const ssid = match[1].trim();
    if (!ssid) {
      continue;
    }

    const channel = Number(match[4]);
    networks.push({
      ssid,
      signalStrength: rssiToQuality(Number(match[3])),
      frequency: channelToFrequency(channel),
      connected: ssid === connectedSsid,
    });
  }

  return networks;
}

export interface BlueutilDevice {
  address: string;
  name: string;
  rssi: number | null;
  paired: boolean;
  connected: boolean;
}

/**
 * Parses the JSON array printed by `blueutil --format json`.
 */
export function parseBlueutilDevices(stdout: string): BlueutilDevice[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) {
    return [];
  }

  const entries: unknown[] = parsed;
  const devices: BlueutilDevice[] = [];
  for (const entry of entries) {
    if (typeof entry !== "object" || entry === null || !("address" in entry) || typeof entry.address !== "string") {
      continue;
    }

    const address = entry.address.replace(/-/g, ":").toUpperCase();
    const name = "name" in entry && typeof entry.name === "string" && entry.name ? entry.name : address;
    const rssi = "RSSI" in entry && typeof entry.RSSI === "number" ? entry.RSSI : null;
    devices.push({
      address,
      name,
      rssi,
      paired: "paired" in entry && entry.paired === true,
      connected: "connected" in entry && entry.connected === true,
    });
  }
  return devices;
}

/**
 * Reads the device and size columns of the data row of `df -k <path>`.
 */
export function parseDfRow(stdout: string): { device: string; sizeGb: number } | null {
  const lines = stdout.split("\n").filter((line) => line.trim());
  if (lines.length < 2) {
    return null;
  }

  const parts = lines[1].trim().split(/\s+/);
  if (parts.length < 6) {
    return null;
  }

  const blocks = Number(parts[1]);
  return {
    device: parts[0],
    sizeGb: Number.isFinite(blocks) ? Math.round(((blocks * 1024) / 1024 ** 3) * 100) / 100 : 0,
  };
}

export function parseDiskutilInfo(stdout: string): { deviceNode: string | null; filesystem: string | null } {
  let deviceNode: string | null = null;
  let filesystem: string | null = null;

  for (const line of stdout.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("Device Node:")) {
      deviceNode = trimmed.slice("Device Node:".length).trim() || null;
    } else if (trimmed.startsWith("File System Personality:")) {
      filesystem = trimmed.slice("File System Personality:".length).trim() || null;
    }
  }

  return { deviceNode, filesystem };
}

/**
 * Parses `pmset -g batt`:
 * `Now drawing from 'AC Power'` then ` -InternalBattery-0 (id=123)\t85%; charging; ...`.
 */
export function parsePmsetBattery(stdout: string): BatteryState | null {
  const percent = /(\d+)%;/.exec(stdout);
  if (!percent) {
    return null;
  }
  return {
    percent: Number(percent[1]),
    plugged: stdout.includes("'AC Power'"),
  };
}

/**
 * Sums `Ibytes`/`Obytes` of the link-level rows of `netstat -ib`, skipping
 * loopback. Counted from the right because the Address column can be empty.
 */
export function parseNetstatIb(stdout: string): NetworkCounters {
  let received = 0;
  let sent = 0;

  for (const line of stdout.split("\n").slice(1)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 10 || !parts[2]?.startsWith("<Link#") || parts[0].startsWith("lo")) {
      continue;
    }

    received += Number(parts[parts.length - 5]) || 0;
    sent += Number(parts[parts.length - 2]) || 0;
  }

  return { sent, received };
}

function channelToFrequency(channel: number): number | null {
  if (channel >= 1 && channel <= 13) {
    return 2407 + channel * 5;
  }
  if (channel === 14) {
    return 2484;
  }
  if (channel >= 32 && channel <= 177) {
    return 5000 + channel * 5;
  }
  return null;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
