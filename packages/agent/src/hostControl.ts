import { BluetoothAction } from "../../shared/src/contracts";
import { BluetoothSighting, PairedDevice } from "./bluetoothTable";
import { RunOptions } from "./commandRunner";
import {
  BatteryState,
  BluetoothActionResult,
  BrightnessState,
  CommandResult,
  ControlResult,
  DriveActionResult,
  DriveRecord,
  NetworkCounters,
  UnmountedDrive,
  VolumeState,
  WifiNetwork,
  WifiState,
} from "./types";

/**
 * The slice of `CommandRunner` the platform providers need.
 */
export interface CommandExecutor {
  run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Platform access used by producers, the dispatcher and the HTTP routes.
 * Every method reports failure as a value; none of them throws for a missing
 * tool or a non-zero exit.
 */
export interface HostControl {
  readonly platformName: string;

  getBrightness(): Promise<BrightnessState>;
  setBrightness(level: number): Promise<ControlResult>;
  getVolume(): Promise<VolumeState>;
  setVolume(level: number): Promise<ControlResult>;
  toggleMute(): Promise<ControlResult>;

  getWifi(signal?: AbortSignal): Promise<WifiState>;

  isBluetoothAvailable(): Promise<boolean>;
  scanBluetooth(durationMs: number, signal?: AbortSignal): Promise<BluetoothSighting[]>;
  listPairedBluetooth(signal?: AbortSignal): Promise<PairedDevice[]>;
  bluetoothAction(action: BluetoothAction, address: string): Promise<BluetoothActionResult>;

  /** Mounted removable drives with `files` left empty; `null` when the scan itself failed. */
  listDrives(signal?: AbortSignal): Promise<DriveRecord[] | null>;
  listUnmountedDrives(signal?: AbortSignal): Promise<UnmountedDrive[] | null>;
  mountDrive(device: string): Promise<DriveActionResult>;
  unmountDrive(device: string): Promise<DriveActionResult>;

  getBattery(): Promise<BatteryState | null>;
  getNetworkCounters(): Promise<NetworkCounters | null>;
}

export const MAX_WIFI_NETWORKS = 20;

export function clampBrightness(level: number): number {
  return Math.max(1, Math.min(100, Math.round(level)));
}

export function clampVolume(level: number): number {
  return Math.max(0, Math.min(100, Math.round(level)));
}

/**
 * Maps a dBm reading onto 0-100.
 */
export function rssiToQuality(rssi: number): number {
  return Math.max(0, Math.min(100, (rssi + 100) * 2));
}

export function bytesToGb(bytes: number): number {
  return Math.round((bytes / 1024 ** 3) * 100) / 100;
}

/**
 * Keeps the strongest entry per SSID and returns the top networks by signal.
 */
export function rankNetworks(networks: readonly WifiNetwork[]): WifiNetwork[] {
  const bySsid = new Map<string, WifiNetwork>();
  for (const network of networks) {
    if (!network.ssid) {
      continue;
    }
    const existing = bySsid.get(network.ssid);
    if (!existing) {
      bySsid.set(network.ssid, { ...network });
      continue;
    }

    const stronger = network.signalStrength > existing.signalStrength ? network : existing;
    bySsid.set(network.ssid, { ...stronger, connected: existing.connected || network.connected });
  }

  return [...bySsid.values()]
    .sort((left, right) => right.signalStrength - left.signalStrength)
    .slice(0, MAX_WIFI_NETWORKS);
}

export function unavailableWifi(error: string): WifiState {
  return { available: false, connected: false, ssid: null, signalStrength: 0, scan: [], error };
}

export function failureText(result: CommandResult, fallback: string): string {
  return result.error || result.stderr || result.stdout || fallback;
}

/**
 * Provider for hosts without a supported toolchain.
 */
export class UnsupportedHostControl implements HostControl {
  public constructor(public readonly platformName: string) {}

  private get reason(): string {
    return `Not supported on ${this.platformName}`;
  }

  public async getBrightness(): Promise<BrightnessState> {
    return { available: false, brightness: 0, error: this.reason };
  }

  public async setBrightness(_level: number): Promise<ControlResult> {
    return { success: false, error: this.reason };
  }

  public async getVolume(): Promise<VolumeState> {
    return { available: false, volume: 0, muted: false, error: this.reason };
  }

  public async setVolume(_level: number): Promise<ControlResult> {
    return { success: false, error: this.reason };
  }

  public async toggleMute(): Promise<ControlResult> {
    return { success: false, error: this.reason };
  }

  public async getWifi(): Promise<WifiState> {
    return unavailableWifi(this.reason);
  }

  public async isBluetoothAvailable(): Promise<boolean> {
    return false;
  }

  public async scanBluetooth(): Promise<BluetoothSighting[]> {
    return [];
  }

  public async listPairedBluetooth(): Promise<PairedDevice[]> {
    return [];
  }

  public async bluetoothAction(_action: BluetoothAction, _address: string): Promise<BluetoothActionResult> {
    return { success: false, error: this.reason };
  }

  public async listDrives(): Promise<DriveRecord[] | null> {
    return [];
  }

  public async listUnmountedDrives(): Promise<UnmountedDrive[] | null> {
    return [];
  }

  public async mountDrive(_device: string): Promise<DriveActionResult> {
    return { success: false, error: this.reason };
  }

  public async unmountDrive(_device: string): Promise<DriveActionResult> {
    return { success: false, error: this.reason };
  }

  public async getBattery(): Promise<BatteryState | null> {
    return null;
  }

  public async getNetworkCounters(): Promise<NetworkCounters | null> {
    return null;
  }
}
