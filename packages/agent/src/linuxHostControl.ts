import { readdir, readFile } from "fs/promises";
import { basename, join } from "path";
import { BluetoothAction } from "../../shared/src/contracts";
import { BluetoothSighting, PairedDevice } from "./bluetoothTable";
import {
  bytesToGb,
  clampBrightness,
  clampVolume,
  CommandExecutor,
  failureText,
  HostControl,
  rankNetworks,
  unavailableWifi,
} from "./hostControl";
import {
  BatteryState,
  BluetoothActionResult,
  BrightnessState,
  CommandResult,
  ControlResult,
  DriveActionResult,
  DriveRecord,
  MountPoint,
  NetworkCounters,
  UnmountedDrive,
  VolumeState,
  WifiNetwork,
  WifiState,
} from "./types";

export interface LinuxHostOptions {
  mountTimeoutMs: number;
  sysfsRoot?: string;
  procfsRoot?: string;
}

const LSBLK_COLUMNS = "NAME,PATH,SIZE,TYPE,TRAN,RM,LABEL,MODEL,FSTYPE,MOUNTPOINT";
const BLUETOOTH_ADDRESS = "([0-9A-Fa-f]{2}(?::[0-9A-Fa-f]{2}){5})";

/**
 * Linux provider backed by brightnessctl, amixer, nmcli, bluetoothctl,
 * lsblk, udisksctl, sysfs and procfs.
 */
export class LinuxHostControl implements HostControl {
  public readonly platformName = "Linux";
  private readonly sysfsRoot: string;
  private readonly procfsRoot: string;

  public constructor(
    private readonly runner: CommandExecutor,
    private readonly options: LinuxHostOptions,
  ) {
    this.sysfsRoot = options.sysfsRoot ?? "/sys";
    this.procfsRoot = options.procfsRoot ?? "/proc";
  }

  public async getBrightness(): Promise<BrightnessState> {
    const result = await this.runner.run(["brightnessctl", "-m"]);
    const brightness = result.success ? parseBrightnessctl(result.stdout ?? "") : null;
    if (brightness === null) {
      return { available: false, brightness: 0, error: failureText(result, "brightnessctl not available") };
    }
    return { available: true, brightness };
  }

  public async setBrightness(level: number): Promise<ControlResult> {
    const brightness = clampBrightness(level);
    const result = await this.runner.run(["brightnessctl", "set", `${brightness}%`]);
    if (!result.success) {
      return { success: false, error: failureText(result, "brightnessctl failed") };
    }
    return { success: true, brightness };
  }

  public async getVolume(): Promise<VolumeState> {
    const result = await this.runner.run(["amixer", "get", "Master"]);
    const parsed = result.success ? parseAmixer(result.stdout ?? "") : null;
    if (!parsed) {
      return { available: false, volume: 0, muted: true, error: failureText(result, "No audio control available") };
    }
    return { available: true, ...parsed };
  }

  public async setVolume(level: number): Promise<ControlResult> {
    const volume = clampVolume(level);
    const result = await this.runner.run(["amixer", "set", "Master", `${volume}%`]);
    if (!result.success) {
      return { success: false, error: failureText(result, "Volume set failed") };
    }
    return { success: true, volume };
  }

  public async toggleMute(): Promise<ControlResult> {
    const result = await this.runner.run(["amixer", "set", "Master", "toggle"]);
    if (!result.success) {
      return { success: false, error: failureText(result, "Mute toggle failed") };
    }

    const parsed = parseAmixer(result.stdout ?? "");
    if (parsed) {
      return { success: true, muted: parsed.muted };
    }

    const state = await this.getVolume();
    return { success: true, muted: state.muted };
  }

  public async getWifi(signal?: AbortSignal): Promise<WifiState> {
    const result = await this.runner.run(["nmcli", "-t", "-f", "ACTIVE,SSID,SIGNAL,FREQ", "device", "wifi", "list"], {
      signal,
    });
    if (!result.success) {
      return unavailableWifi(failureText(result, "NetworkManager not available"));
    }
    return parseNmcliWifi(result.stdout ?? "");
  }

  public async isBluetoothAvailable(): Promise<boolean> {
    const result = await this.runner.run(["bluetoothctl", "show"]);
    return result.success && (result.stdout ?? "").includes("Controller");
  }

  public async scanBluetooth(durationMs: number, signal?: AbortSignal): Promise<BluetoothSighting[]> {
    const seconds = Math.max(1, Math.ceil(durationMs / 1000));
    const result = await this.runner.run(["bluetoothctl", "--timeout", String(seconds), "scan", "on"], {
      timeoutMs: seconds * 1000 + 2_000,
      signal,
    });
    return parseBluetoothctlScan(result.stdout ?? "");
  }

  public async listPairedBluetooth(signal?: AbortSignal): Promise<PairedDevice[]> {
    const [paired, connected] = await Promise.all([
      this.runner.run(["bluetoothctl", "devices", "Paired"], { signal }),
      this.runner.run(["bluetoothctl", "devices", "Connected"], { signal }),
    ]);
    if (!paired.success) {
      return [];
    }

    const connectedAddresses = new Set(
      parseBluetoothctlDevices(connected.stdout ?? "").map((device) => device.address),
    );
    return parseBluetoothctlDevices(paired.stdout ?? "").map((device) => ({
      ...device,
      connected: connectedAddresses.has(device.address),
    }));
  }

  public async bluetoothAction(action: BluetoothAction, address: string): Promise<BluetoothActionResult> {
    const verb = action === "unpair" ? "remove" : action;
    const result = await this.runner.run(["bluetoothctl", verb, address], { timeoutMs: 20_000 });
    return interpretBluetoothctl(result);
  }

  public async listDrives(signal?: AbortSignal): Promise<DriveRecord[] | null> {
    const devices = await this.lsblk(signal);
    return devices ? lsblkDrives(devices) : null;
  }

  public async listUnmountedDrives(signal?: AbortSignal): Promise<UnmountedDrive[] | null> {
    const devices = await this.lsblk(signal);
    return devices ? lsblkUnmounted(devices) : null;
  }

  public async mountDrive(device: string): Promise<DriveActionResult> {
    const result = await this.runner.run(["udisksctl", "mount", "-b", device], {
      timeoutMs: this.options.mountTimeoutMs,
    });
    if (!result.success) {
      return { success: false, error: failureText(result, "Mount failed") };
    }

    const mountPoint = parseUdisksMount(result.stdout ?? "");
    if (!mountPoint) {
      return { success: true, message: "Drive mounted successfully" };
    }
    return { success: true, mountPoint, message: `Mounted at ${mountPoint}` };
  }

  public async unmountDrive(device: string): Promise<DriveActionResult> {
    const result = await this.runner.run(["udisksctl", "unmount", "-b", device], {
      timeoutMs: this.options.mountTimeoutMs,
    });
    if (result.success) {
      return { success: true, message: `Safely removed ${device}` };
    }

    // udisks missing or unaware of the device: plain umount.
    const error = failureText(result, "Unmount failed");
    if (!error.includes("not found")) {
      return { success: false, error };
    }

    const manual = await this.runner.run(["sudo", "umount", device], { timeoutMs: this.options.mountTimeoutMs });
    if (!manual.success) {
      return { success: false, error: "Manual unmount failed" };
    }
    return { success: true, message: `Safely removed ${device}` };
  }

  public async getBattery(): Promise<BatteryState | null> {
    const root = join(this.sysfsRoot, "class", "power_supply");
    let names: string[];
    try {
      names = await readdir(root);
    } catch {
      return null;
    }

    const entries = await Promise.all(
      names.map(async (name): Promise<PowerSupplyEntry> => {
        const dir = join(root, name);
        return {
          name,
          type: (await readOptional(join(dir, "type"))) ?? "",
          capacity: await readOptional(join(dir, "capacity")),
          status: await readOptional(join(dir, "status")),
          online: await readOptional(join(dir, "online")),
        };
      }),
    );
    return summarizePowerSupplies(entries);
  }

  public async getNetworkCounters(): Promise<NetworkCounters | null> {
    const text = await readOptional(join(this.procfsRoot, "net", "dev"));
    return text === undefined ? null : parseProcNetDev(text);
  }

  private async lsblk(signal?: AbortSignal): Promise<BlockDevice[] | null> {
    const result = await this.runner.run(["lsblk", "-J", "-b", "-o", LSBLK_COLUMNS], { signal });
    if (!result.success) {
      return null;
    }
    return parseLsblk(result.stdout ?? "");
  }
}

/**
 * Reads the percentage column of `brightnessctl -m`
 * (`intel_backlight,backlight,19200,80%,24000`).
 */
export function parseBrightnessctl(stdout: string): number | null {
  const firstLine = stdout.split("\n")[0] ?? "";
  for (const field of firstLine.split(",")) {
    const match = /^(\d+)%$/.exec(field.trim());
    if (match) {
      return Number(match[1]);
    }
  }
  return null;
}

export function parseAmixer(stdout: string): { volume: number; muted: boolean } | null {
  const match = /\[(\d+)%\]/.exec(stdout);
  if (!match) {
    return null;
  }
  return { volume: Number(match[1]), muted: stdout.includes("[off]") };
}

/**
 * Parses `nmcli -t -f ACTIVE,SSID,SIGNAL,FREQ device wifi list`.
 */
export function parseNmcliWifi(stdout: string): WifiState {
  const networks: WifiNetwork[] = [];

  for (const line of stdout.split("\n")) {
    if (!line.trim()) {
      continue;
    }

    const [active, ssid, signal, frequency] = splitTerseFields(line);
    if (!ssid) {
      continue;
    }

    const parsedFrequency = Number.parseInt(frequency ?? "", 10);
    networks.push({
      ssid,
      signalStrength: Number.parseInt(signal ?? "", 10) || 0,
      frequency: Number.isFinite(parsedFrequency) ? parsedFrequency : null,
      connected: active === "yes",
    });
  }

  const current = networks.find((network) => network.connected) ?? null;
  return {
    available: true,
    connected: current !== null,
    ssid: current?.ssid ?? null,
    signalStrength: current?.signalStrength ?? 0,
    scan: rankNetworks(networks),
  };
}

/**
 * Splits one line of nmcli terse output, honouring `\:` and `\\` escapes.
 */
export function splitTerseFields(line: string): string[] {
  const fields: string[] = [];
  let current = "";

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === "\\" && index + 1 < line.length) {
      current += line[index + 1];
      index += 1;
      continue;
    }
    if (char === ":") {
      fields.push(current);
      current = "";
      continue;
    }
    current += char;
  }

  fields.push(current);
  return fields;
}

/**
 * Collects devices from `bluetoothctl scan on` output. `[NEW]` lines carry the
 * name, `[CHG]` lines update RSSI or name.
 */
export function parseBluetoothctlScan(stdout: string): BluetoothSighting[] {
  const pattern = new RegExp(`\\[(NEW|CHG)\\] Device ${BLUETOOTH_ADDRESS}\\s*(.*)$`);
  const sightings = new Map<string, BluetoothSighting>();

  for (const rawLine of stdout.split("\n")) {
    const line = stripAnsi(rawLine).trim();
    const match = pattern.exec(line);
    if (!match) {
      continue;
    }

    const [, kind, rawAddress, rest] = match;
    const address = rawAddress.toUpperCase();
    const sighting = sightings.get(address) ?? { address };

    if (kind === "NEW") {
      sighting.name = rest.trim() || sighting.name;
    } else {
      const rssi = /RSSI:\s*(?:0x[0-9a-fA-F]+\s*\()?(-?\d+)\)?/.exec(rest);
      const name = /^(?:Name|Alias):\s*(.+)$/.exec(rest);
      if (rssi) {
        sighting.rssi = Number(rssi[1]);
      } else if (name) {
        sighting.name = name[1].trim();
      }
    }

    sightings.set(address, sighting);
  }

  return [...sightings.values()];
}

/**
 * Parses `bluetoothctl devices [Paired|Connected]` lines (`Device AA:BB:.. Name`).
 */
export function parseBluetoothctlDevices(stdout: string): Array<{ address: string; name: string }> {
  const pattern = new RegExp(`^Device ${BLUETOOTH_ADDRESS}\\s*(.*)$`);
  const devices: Array<{ address: string; name: string }> = [];

  for (const rawLine of stdout.split("\n")) {
    const match = pattern.exec(stripAnsi(rawLine).trim());
    if (!match) {
      continue;
    }
    const address = match[1].toUpperCase();
    devices.push({ address, name: match[2].trim() || address });
  }

  return devices;
}

/**
 * bluetoothctl exits 0 for most failures, so the output decides.
 */
export function interpretBluetoothctl(result: CommandResult): BluetoothActionResult {
  const output = stripAnsi(result.stdout ?? "");
  const failureLine = output
    .split("\n")
    .map((line) => line.trim())
    .find((line) => /^(Failed|Device .* not available|Error)/.test(line) || line.includes("org.bluez.Error"));

  if (!result.success || failureLine) {
    return { success: false, error: failureLine ?? failureText(result, "bluetoothctl failed") };
  }

  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  return { success: true, message: lines[lines.length - 1] ?? "Done" };
}

export interface BlockDevice {
  name: string;
  path: string;
  sizeBytes: number;
  type: string;
  transport: string | null;
  removable: boolean;
  label: string | null;
  model: string | null;
  fstype: string | null;
  mountPoints: string[];
  children: BlockDevice[];
}

/**
 * Parses `lsblk -J -b` output. Accepts both the boolean and the "0"/"1"
 * forms of `rm` and either `mountpoint` or `mountpoints`.
 */
/**
 * Returns `null` when the output is not an lsblk JSON document.
 */
export function parseLsblk(stdout: string): BlockDevice[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return null;
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.blockdevices)) {
    return null;
  }

  return parsed.blockdevices.map(toBlockDevice).filter((device): device is BlockDevice => device !== null);
}

export function lsblkDrives(devices: readonly BlockDevice[]): DriveRecord[] {
  const drives: DriveRecord[] = [];

  for (const disk of devices.filter(isRemovableDisk)) {
    const volumes = [disk, ...disk.children];
    const mountPoints: MountPoint[] = [];
    let label: string | null = null;

    for (const volume of volumes) {
      for (const mountPoint of volume.mountPoints) {
        mountPoints.push({
          device: volume.path,
          mountPoint,
          mountName: mountPoint === "/" ? "root" : basename(mountPoint),
          filesystem: volume.fstype ?? "unknown",
        });
        label = label ?? volume.label;
      }
    }

    if (mountPoints.length === 0) {
      continue;
    }

    drives.push({
      deviceNode: disk.path,
      name: label || mountPoints[0].mountName,
      sizeGb: bytesToGb(disk.sizeBytes),
      mountPoints,
      files: [],
    });
  }

  return drives;
}

export function lsblkUnmounted(devices: readonly BlockDevice[]): UnmountedDrive[] {
  const unmounted: UnmountedDrive[] = [];

  for (const disk of devices.filter(isRemovableDisk)) {
    const volumes = disk.children.length > 0 ? disk.children : [disk];
    for (const volume of volumes) {
      if (!volume.fstype || volume.mountPoints.length > 0) {
        continue;
      }
      unmounted.push({
        deviceNode: volume.path,
        name: volume.label || disk.model || "Unknown USB Drive",
        filesystem: volume.fstype,
        sizeGb: bytesToGb(volume.sizeBytes),
      });
    }
  }

  return unmounted;
}

/**
 * Extracts the mount point from `Mounted /dev/sdb1 at /run/media/user/STICK`.
 */
export function parseUdisksMount(stdout: string): string | null {
  const match = /Mounted \S+ at (.+?)\.?$/m.exec(stdout.trim());
  return match ? match[1] : null;
}

export interface PowerSupplyEntry {
  name: string;
  type: string;
  capacity?: string;
  status?: string;
  online?: string;
}

export function summarizePowerSupplies(entries: readonly PowerSupplyEntry[]): BatteryState | null {
  const capacities = entries
    .filter((entry) => entry.type === "Battery")
    .map((entry) => ({ entry, capacity: Number(entry.capacity) }))
    .filter(({ entry, capacity }) => entry.capacity !== undefined && Number.isFinite(capacity));

  if (capacities.length === 0) {
    return null;
  }

  const total = capacities.reduce((sum, { capacity }) => sum + capacity, 0);
  const onMains = entries.some((entry) => entry.type === "Mains" && entry.online === "1");
  const charging = capacities.some(({ entry }) => entry.status === "Charging" || entry.status === "Full");

  return {
    percent: Math.round((total / capacities.length) * 10) / 10,
    plugged: onMains || charging,
  };
}

/**
 * Sums receive/transmit bytes of every interface except loopback.
 */
export function parseProcNetDev(text: string): NetworkCounters {
  let received = 0;
  let sent = 0;

  for (const line of text.split("\n")) {
    const separator = line.indexOf(":");
    if (separator === -1) {
      continue;
    }

    const name = line.slice(0, separator).trim();
    if (!name || name === "lo" || name.includes("|")) {
      continue;
    }

    const fields = line
      .slice(separator + 1)
      .trim()
      .split(/\s+/)
      .map(Number);
    if (fields.length < 9) {
      continue;
    }

    received += fields[0] || 0;
    sent += fields[8] || 0;
  }

  return { sent, received };
}

function toBlockDevice(value: unknown): BlockDevice | null {
  if (!isRecord(value) || typeof value.name !== "string") {
    return null;
  }

  const mountPoints = Array.isArray(value.mountpoints)
    ? value.mountpoints.filter((entry): entry is string => typeof entry === "string" && entry.length > 0)
    : typeof value.mountpoint === "string" && value.mountpoint
      ? [value.mountpoint]
      : [];

  const children = Array.isArray(value.children)
    ? value.children.map(toBlockDevice).filter((child): child is BlockDevice => child !== null)
    : [];

  return {
    name: value.name,
    path: typeof value.path === "string" && value.path ? value.path : `/dev/${value.name}`,
    sizeBytes: Number(value.size) || 0,
    type: typeof value.type === "string" ? value.type : "",
    transport: typeof value.tran === "string" ? value.tran : null,
    removable: value.rm === true || value.rm === "1" || value.rm === 1,
    label: optionalString(value.label),
    model: optionalString(value.model),
    fstype: optionalString(value.fstype),
    mountPoints,
    children,
  };
}

function isRemovableDisk(device: BlockDevice): boolean {
  return device.type === "disk" && (device.transport === "usb" || device.removable);
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripAnsi(value: string): string {
  return value.replace(/\x1b\[[0-9;]*m/g, "").replace(/\r/g, "");
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return (await readFile(path, "utf8")).trim();
  } catch {
    return undefined;
  }
}
