import type {
  BluetoothDeviceRecord,
  BrightnessState,
  CommandResult,
  ControlResult,
  DriveActionResult,
  DriveRecord,
  MetricsSnapshot,
  SystemInfo,
  VolumeState,
  WifiState,
} from "./models";

export * from "./models";

/**
 * Shared push-channel contracts consumed by the agent and browser clients.
 *
 * Every frame on the channel is `{ "cmd": string, "val": any }`.
 */
export const CHANNEL_COMMANDS = [
  "ping",
  "get_metrics",
  "get_system_info",
  "brightness_get",
  "brightness_set",
  "volume_get",
  "volume_set",
  "volume_mute",
  "wifi_scan",
  "bluetooth_scan",
  "bluetooth_connect",
  "bluetooth_disconnect",
  "bluetooth_pair",
  "bluetooth_unpair",
  "drives_get",
  "drive_mount",
  "drive_unmount",
  "run_command",
] as const;

export type ChannelCommand = (typeof CHANNEL_COMMANDS)[number];

export type DriveChangeType = "initial" | "addition" | "removal" | "periodic";
export type BluetoothAction = "connect" | "disconnect" | "pair" | "unpair";
export type DriveAction = "mount" | "unmount";

export interface ServerEventMap {
  handshake: { server: string; version: string };
  pong: { timestamp: number };
  error: { message: string };
  metrics: MetricsSnapshot;
  metrics_update: MetricsSnapshot;
  system_info: SystemInfo;
  drives_update: { drives: DriveRecord[]; change_type: DriveChangeType };
  drives_response: { drives: DriveRecord[] };
  bluetooth_update: { bluetooth: { devices: BluetoothDeviceRecord[]; count: number; timestamp: number } };
  wifi_update: { wifi: WifiState; timestamp: number };
  brightness_ack: { brightness: number; status: "setting" };
  brightness_response: BrightnessState | ControlResult;
  volume_ack: { volume?: number; status: "setting" | "toggling_mute" };
  volume_response: VolumeState | ControlResult;
  wifi_ack: { status: "scanning" };
  wifi_response: WifiState;
  bluetooth_ack: { action: BluetoothAction | "scan"; address?: string; status: string };
  bluetooth_response: {
    action: BluetoothAction | "scan";
    address?: string;
    success: boolean;
    devices?: BluetoothDeviceRecord[];
    message?: string;
    error?: string;
  };
  drive_ack: { action: DriveAction; device: string; status: "mounting" | "unmounting" };
  drive_response: DriveActionResult & { action: DriveAction; device: string };
  run_ack: { command: string; status: "running" };
  run_response: CommandResult;
}

export type ServerEventName = keyof ServerEventMap;

export interface ServerEvent<K extends ServerEventName = ServerEventName> {
  cmd: K;
  val: ServerEventMap[K];
}

export interface InboundMessage {
  cmd: string;
  val?: unknown;
}

export type InboundParseResult = { ok: true; message: InboundMessage } | { ok: false; reason: string };

export interface RunCommandRequest {
  command: string;
  timeoutMs?: number;
}

export interface ApiSuccess<T> {
  status: "success";
  data: T;
}

export interface ApiError {
  status: "error";
  message: string;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiError;

export function isChannelCommand(value: string): value is ChannelCommand {
  return (CHANNEL_COMMANDS as readonly string[]).includes(value);
}

export function createEvent<K extends ServerEventName>(cmd: K, val: ServerEventMap[K]): ServerEvent<K> {
  return { cmd, val };
}

/**
 * Parse one raw channel frame into a command message.
 * Never throws: malformed frames come back with a human-readable reason.
 */
export function parseInboundMessage(raw: string): InboundParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "Invalid JSON" };
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { ok: false, reason: "Message must be a JSON object." };
  }

  const record = parsed as Record<string, unknown>;
  if (typeof record.cmd !== "string" || !record.cmd) {
    return { ok: false, reason: "Missing 'cmd' field." };
  }

  return { ok: true, message: { cmd: record.cmd, val: record.val } };
}

/**
 * Parse a percentage payload. Accepts a number, a numeric string, or an object
 * carrying the value under `field`. Missing values resolve to `fallback`.
 */
export function parsePercent(value: unknown, field: string, fallback: number): number {
  const raw = value && typeof value === "object" && !Array.isArray(value)
    ? (value as Record<string, unknown>)[field]
    : value;

  if (raw === undefined || raw === null) {
    return fallback;
  }

  const numeric = typeof raw === "string" && raw.trim() ? Number(raw) : raw;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
    throw new Error(`Field '${field}' must be a number.`);
  }

  return Math.round(numeric);
}

/**
 * Parse a block device reference (`/dev/sdb1`, `disk4s1`).
 */
export function parseDeviceValue(value: unknown): string {
  const raw = pickStringField(value, "device");
  const device = requireNonEmptyString(raw, "device");

  if (device.startsWith("-") || /\s/.test(device)) {
    throw new Error("Field 'device' must be a device path.");
  }

  return device;
}

/**
 * Parse a Bluetooth hardware address. Accepts `:` or `-` separators and
 * returns the upper-cased, colon-separated form.
 */
export function parseBluetoothAddress(value: unknown): string {
  const raw = pickStringField(value, "address");
  const address = requireNonEmptyString(raw, "address");

  if (!/^[0-9A-Fa-f]{2}([:-][0-9A-Fa-f]{2}){5}$/.test(address)) {
    throw new Error("Field 'address' must be a Bluetooth address (AA:BB:CC:DD:EE:FF).");
  }

  return address.replace(/-/g, ":").toUpperCase();
}

/**
 * Parse and validate a run-command payload.
 * Throws a descriptive error when payload is invalid.
 */
export function parseRunCommandRequest(value: unknown): RunCommandRequest {
  if (typeof value === "string") {
    return { command: requireNonEmptyString(value, "command") };
  }

  const payload = requireObject(value, "run command payload");
  const command = requireNonEmptyString(payload.command, "command");

  if (payload.timeoutMs === undefined || payload.timeoutMs === null) {
    return { command };
  }

  const timeoutMs = payload.timeoutMs;
  if (typeof timeoutMs !== "number" || !Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > 120_000) {
    throw new Error("Field 'timeoutMs' must be an integer between 1 and 120000.");
  }

  return { command, timeoutMs };
}

export function requireObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }

  return value as Record<string, unknown>;
}

function requireNonEmptyString(value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new Error(`Field '${field}' must be a string.`);
  }

  const normalized = value.trim();
  if (!normalized) {
    throw new Error(`Field '${field}' must not be empty.`);
  }

  return normalized;
}

function pickStringField(value: unknown, field: string): unknown {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return (value as Record<string, unknown>)[field];
  }
  return value;
}
