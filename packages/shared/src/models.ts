/**
 * Data records exchanged with channel and HTTP clients.
 */

export interface CommandResult {
  success: boolean;
  stdout?: string;
  stderr?: string;
  exitCode?: number | null;
  error?: string;
}

export interface CpuState {
  percent: number;
}

export interface MemoryState {
  total: number;
  used: number;
  percent: number;
}

export interface DiskState {
  total: number;
  used: number;
  percent: number;
}

export interface NetworkCounters {
  sent: number;
  received: number;
}

export interface BatteryState {
  percent: number;
  plugged: boolean;
}

export interface WifiNetwork {
  ssid: string;
  signalStrength: number;
  frequency: number | null;
  connected: boolean;
}

export interface WifiState {
  available: boolean;
  connected: boolean;
  ssid: string | null;
  signalStrength: number;
  scan: WifiNetwork[];
  error?: string;
}

export interface BrightnessState {
  available: boolean;
  brightness: number;
  error?: string;
}

export interface VolumeState {
  available: boolean;
  volume: number;
  muted: boolean;
  error?: string;
}

export interface DirectoryEntry {
  name: string;
  path: string;
  type: "directory" | "file";
  size: number;
  modified: number;
  extension?: string;
}

export interface MountPoint {
  device: string;
  mountPoint: string;
  mountName: string;
  filesystem: string;
}

export interface DriveRecord {
  deviceNode: string;
  name: string;
  sizeGb: number;
  mountPoints: MountPoint[];
  files: DirectoryEntry[];
}

export interface UnmountedDrive {
  deviceNode: string;
  name: string;
  filesystem: string;
  sizeGb: number;
}

export interface BluetoothDeviceRecord {
  address: string;
  name: string;
  rssi: number;
  paired: boolean;
  connected: boolean;
  nearby: boolean;
  lastSeen: number;
}

export interface SystemInfo {
  platform: {
    system: string;
    architecture: string;
    release: string;
  };
  hostname: string;
  cpu: {
    cores: number;
    threads: number;
    model: string;
  };
  memory: {
    totalGb: number;
  };
  bluetooth: {
    available: boolean;
  };
  agentVersion: string;
}

export interface MetricsValues {
  cpu: CpuState;
  memory: MemoryState;
  disk: DiskState;
  network: NetworkCounters;
  battery: BatteryState;
  wifi: WifiState;
  drives: DriveRecord[];
  bluetooth: BluetoothDeviceRecord[];
  brightness: BrightnessState;
  volume: VolumeState;
}

export type MetricsCategory = keyof MetricsValues;

export interface MetricsField<T> {
  value: T | null;
  updatedAt: number | null;
}

export type MetricsSnapshot = {
  [K in MetricsCategory]: MetricsField<MetricsValues[K]>;
};

export interface ControlResult {
  success: boolean;
  brightness?: number;
  volume?: number;
  muted?: boolean;
  error?: string;
}

export interface DriveActionResult {
  success: boolean;
  mountPoint?: string;
  message?: string;
  error?: string;
}

export interface BluetoothActionResult {
  success: boolean;
  message?: string;
  error?: string;
}
