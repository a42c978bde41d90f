export type {
  BatteryState,
  BluetoothActionResult,
  BluetoothDeviceRecord,
  BrightnessState,
  CommandResult,
  ControlResult,
  CpuState,
  DirectoryEntry,
  DiskState,
  DriveActionResult,
  DriveRecord,
  MemoryState,
  MetricsCategory,
  MetricsSnapshot,
  MetricsValues,
  MountPoint,
  NetworkCounters,
  SystemInfo,
  UnmountedDrive,
  VolumeState,
  WifiNetwork,
  WifiState,
} from "../../shared/src/contracts";

export const AGENT_SERVER_NAME = "hostlink-agent";
export const AGENT_VERSION = "1.0.0";

export interface ProducerTiming {
  intervalMs: number;
  idleIntervalMs: number;
  timeoutMs: number;
}

export interface ProducerTimings {
  system: ProducerTiming;
  disk: ProducerTiming;
  battery: ProducerTiming;
  controls: ProducerTiming;
  wifi: ProducerTiming;
  bluetooth: ProducerTiming;
  driveMonitor: ProducerTiming;
  drivesBroadcast: ProducerTiming;
}

export interface AgentConfig {
  bindHost: string;
  port: number;
  channelPort: number;
  loopbackBypass: boolean;
  originsUrl: string;
  baselineOrigins: string[];
  originsRefreshIntervalMs: number;
  originsFetchTimeoutMs: number;
  producers: ProducerTimings;
  bluetoothScanDurationMs: number;
  bluetoothDeviceTtlMs: number;
  commandTimeoutMs: number;
  mountTimeoutMs: number;
  maxConcurrentCommands: number;
  proxyTimeoutMs: number;
  autoMountDrives: boolean;
  verboseLogs: boolean;
}

/**
 * One connected push-channel peer as seen by the registry.
 *
 * `send` resolves once the frame is handed to the transport and rejects when
 * the peer can no longer receive.
 */
export interface PushClient {
  readonly id: string;
  readonly remoteAddress: string;
  readonly origin: string;
  send(data: string): Promise<void>;
}
