import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { AgentConfig, ProducerTiming, ProducerTimings } from "./types";

type Env = Record<string, string | undefined>;

type ProducerTimingFile = Partial<ProducerTiming>;

interface AgentConfigFile {
  bindHost?: string;
  port?: number;
  channelPort?: number;
  loopbackBypass?: boolean;
  originsUrl?: string;
  baselineOrigins?: string[];
  originsRefreshIntervalMs?: number;
  originsFetchTimeoutMs?: number;
  producers?: Partial<Record<keyof ProducerTimings, ProducerTimingFile>>;
  bluetoothScanDurationMs?: number;
  bluetoothDeviceTtlMs?: number;
  commandTimeoutMs?: number;
  mountTimeoutMs?: number;
  maxConcurrentCommands?: number;
  proxyTimeoutMs?: number;
  autoMountDrives?: boolean;
  verboseLogs?: boolean;
}

export const DEFAULT_ORIGINS_URL = "https://link.rotur.dev/allowed.json";

export const DEFAULT_BASELINE_ORIGINS = [
  "https://turbowarp.org",
  "https://origin.mistium.com",
  "http://localhost:5001",
  "http://localhost:5002",
  "http://localhost:3000",
  "http://127.0.0.1:5001",
  "http://127.0.0.1:5002",
  "http://127.0.0.1:3000",
];

const DEFAULT_PRODUCER_TIMINGS: ProducerTimings = {
  system: { intervalMs: 5_000, idleIntervalMs: 10_000, timeoutMs: 4_000 },
  disk: { intervalMs: 30_000, idleIntervalMs: 60_000, timeoutMs: 5_000 },
  battery: { intervalMs: 60_000, idleIntervalMs: 120_000, timeoutMs: 5_000 },
  controls: { intervalMs: 5_000, idleIntervalMs: 30_000, timeoutMs: 4_000 },
  wifi: { intervalMs: 45_000, idleIntervalMs: 60_000, timeoutMs: 8_000 },
  bluetooth: { intervalMs: 30_000, idleIntervalMs: 30_000, timeoutMs: 10_000 },
  driveMonitor: { intervalMs: 15_000, idleIntervalMs: 60_000, timeoutMs: 10_000 },
  drivesBroadcast: { intervalMs: 30_000, idleIntervalMs: 30_000, timeoutMs: 1_000 },
};

const PRODUCER_ENV_PREFIX: Record<keyof ProducerTimings, string> = {
  system: "SYSTEM",
  disk: "DISK",
  battery: "BATTERY",
  controls: "CONTROLS",
  wifi: "WIFI",
  bluetooth: "BLUETOOTH",
  driveMonitor: "DRIVE_MONITOR",
  drivesBroadcast: "DRIVES_BROADCAST",
};

/**
 * Loads runtime configuration from JSON and environment variables.
 *
 * Precedence order:
 * 1. Environment variables (`HOSTLINK_*`).
 * 2. JSON file content.
 * 3. Built-in defaults.
 */
export function loadConfig(cwd: string, env: Env = process.env): { config: AgentConfig; configPath: string } {
  const configPath = env.HOSTLINK_CONFIG
    ? resolve(env.HOSTLINK_CONFIG)
    : resolve(cwd, "packages/agent/config/agent.config.json");

  const fileConfig = loadConfigFile(configPath);

  const bindHost = normalizeString(env.HOSTLINK_BIND_HOST, fileConfig.bindHost, "127.0.0.1");
  const port = normalizeNumber(env.HOSTLINK_PORT, fileConfig.port, 5001, 0, 65535);
  const channelPort = normalizeNumber(env.HOSTLINK_CHANNEL_PORT, fileConfig.channelPort, 5002, 0, 65535);
  const loopbackBypass = normalizeBoolean(env.HOSTLINK_LOOPBACK_BYPASS, fileConfig.loopbackBypass, true);
  const originsUrl = normalizeString(env.HOSTLINK_ORIGINS_URL, fileConfig.originsUrl, DEFAULT_ORIGINS_URL);
  const baselineOrigins = normalizeStringList(
    env.HOSTLINK_BASELINE_ORIGINS,
    fileConfig.baselineOrigins,
    DEFAULT_BASELINE_ORIGINS,
  );
  const originsRefreshIntervalMs = normalizeNumber(
    env.HOSTLINK_ORIGINS_REFRESH_MS,
    fileConfig.originsRefreshIntervalMs,
    300_000,
    10_000,
    86_400_000,
  );
  const originsFetchTimeoutMs = normalizeNumber(
    env.HOSTLINK_ORIGINS_FETCH_TIMEOUT_MS,
    fileConfig.originsFetchTimeoutMs,
    5_000,
    500,
    60_000,
  );

  const timing = (name: keyof ProducerTimings): ProducerTiming =>
    normalizeTiming(env, PRODUCER_ENV_PREFIX[name], fileConfig.producers?.[name], DEFAULT_PRODUCER_TIMINGS[name]);

  const producers: ProducerTimings = {
    system: timing("system"),
    disk: timing("disk"),
    battery: timing("battery"),
    controls: timing("controls"),
    wifi: timing("wifi"),
    bluetooth: timing("bluetooth"),
    driveMonitor: timing("driveMonitor"),
    drivesBroadcast: timing("drivesBroadcast"),
  };

  const bluetoothScanDurationMs = normalizeNumber(
    env.HOSTLINK_BLUETOOTH_SCAN_DURATION_MS,
    fileConfig.bluetoothScanDurationMs,
    2_000,
    500,
    3_000,
  );
  const bluetoothDeviceTtlMs = normalizeNumber(
    env.HOSTLINK_BLUETOOTH_TTL_MS,
    fileConfig.bluetoothDeviceTtlMs,
    120_000,
    5_000,
    3_600_000,
  );
  const commandTimeoutMs = normalizeNumber(
    env.HOSTLINK_COMMAND_TIMEOUT_MS,
    fileConfig.commandTimeoutMs,
    5_000,
    500,
    120_000,
  );
  const mountTimeoutMs = normalizeNumber(env.HOSTLINK_MOUNT_TIMEOUT_MS, fileConfig.mountTimeoutMs, 30_000, 1_000, 120_000);
  const maxConcurrentCommands = normalizeNumber(
    env.HOSTLINK_MAX_CONCURRENT_COMMANDS,
    fileConfig.maxConcurrentCommands,
    4,
    1,
    32,
  );
  const proxyTimeoutMs = normalizeNumber(env.HOSTLINK_PROXY_TIMEOUT_MS, fileConfig.proxyTimeoutMs, 10_000, 1_000, 120_000);
  const autoMountDrives = normalizeBoolean(env.HOSTLINK_AUTO_MOUNT, fileConfig.autoMountDrives, true);
  const verboseLogs = normalizeBoolean(env.HOSTLINK_VERBOSE, fileConfig.verboseLogs, false);

  const config: AgentConfig = {
    bindHost,
    port,
    channelPort,
    loopbackBypass,
    originsUrl,
    baselineOrigins,
    originsRefreshIntervalMs,
    originsFetchTimeoutMs,
    producers,
    bluetoothScanDurationMs,
    bluetoothDeviceTtlMs,
    commandTimeoutMs,
    mountTimeoutMs,
    maxConcurrentCommands,
    proxyTimeoutMs,
    autoMountDrives,
    verboseLogs,
  };

  persistConfigIfMissing(configPath, config);

  return { config, configPath };
}

function loadConfigFile(configPath: string): AgentConfigFile {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const raw = readFileSync(configPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      return {};
    }
    return parsed as AgentConfigFile;
  } catch {
    return {};
  }
}

function persistConfigIfMissing(configPath: string, config: AgentConfig): void {
  if (existsSync(configPath)) {
    return;
  }

  mkdirSync(dirname(configPath), { recursive: true });
  const payload: AgentConfigFile = { ...config, producers: { ...config.producers } };

  writeFileSync(configPath, JSON.stringify(payload, null, 2));
}

/**
 * Producer timeouts always stay below the producer interval so a hung tool
 * degrades to stale data instead of stacking cycles.
 */
function normalizeTiming(
  env: Env,
  prefix: string,
  fromFile: ProducerTimingFile | undefined,
  fallback: ProducerTiming,
): ProducerTiming {
  const intervalMs = normalizeNumber(
    env[`HOSTLINK_${prefix}_INTERVAL_MS`],
    fromFile?.intervalMs,
    fallback.intervalMs,
    1_000,
    3_600_000,
  );
  const idleIntervalMs = normalizeNumber(
    env[`HOSTLINK_${prefix}_IDLE_INTERVAL_MS`],
    fromFile?.idleIntervalMs,
    Math.max(fallback.idleIntervalMs, intervalMs),
    1_000,
    3_600_000,
  );
  const timeoutMs = normalizeNumber(
    env[`HOSTLINK_${prefix}_TIMEOUT_MS`],
    fromFile?.timeoutMs,
    fallback.timeoutMs,
    100,
    intervalMs - 1,
  );

  return { intervalMs, idleIntervalMs, timeoutMs };
}

function normalizeString(primary: string | undefined, secondary: unknown, fallback: string): string {
  const value = (primary ?? (typeof secondary === "string" ? secondary : fallback)).trim();
  return value || fallback;
}

function normalizeNumber(
  primary: string | undefined,
  secondary: number | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const fromEnv = primary ? Number(primary) : undefined;
  const candidate = fromEnv !== undefined && Number.isFinite(fromEnv) ? fromEnv : secondary;

  if (candidate === undefined || !Number.isFinite(candidate)) {
    return Math.min(Math.max(fallback, min), max);
  }

  const bounded = Math.floor(candidate);
  if (bounded < min) {
    return min;
  }
  if (bounded > max) {
    return max;
  }
  return bounded;
}

function normalizeBoolean(primary: string | undefined, secondary: boolean | undefined, fallback: boolean): boolean {
  if (typeof primary === "string") {
    const value = primary.trim().toLowerCase();
    return value === "1" || value === "true" || value === "yes";
  }

  if (typeof secondary === "boolean") {
    return secondary;
  }

  return fallback;
}

function normalizeStringList(
  primary: string | undefined,
  secondary: string[] | undefined,
  fallback: string[],
): string[] {
  const source: unknown[] = primary
    ? primary.split(",").map((item) => item.trim())
    : Array.isArray(secondary)
      ? secondary
      : fallback;

  const unique = new Set<string>();
  for (const value of source) {
    if (typeof value !== "string") {
      continue;
    }
    const normalized = value.trim();
    if (!normalized) {
      continue;
    }
    unique.add(normalized);
  }

  return [...unique];
}
