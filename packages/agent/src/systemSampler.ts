import { statfs } from "fs/promises";
import os from "os";
import { AGENT_VERSION, DiskState, MemoryState, SystemInfo } from "./types";

export interface CpuTimes {
  idle: number;
  total: number;
}

export interface OsSource {
  cpus(): os.CpuInfo[];
  totalmem(): number;
  freemem(): number;
  hostname(): string;
  platform(): NodeJS.Platform;
  arch(): string;
  release(): string;
}

const PLATFORM_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  linux: "Linux",
  darwin: "macOS",
  win32: "Windows",
};

/**
 * CPU, memory, disk and host facts read through Node's `os` and `fs` modules.
 */
export class SystemSampler {
  private lastCpu: CpuTimes;

  public constructor(
    private readonly source: OsSource = os,
    private readonly diskPath = "/",
  ) {
    this.lastCpu = sumCpuTimes(source.cpus());
  }

  /**
   * Busy share of all cores since the previous call, 0-100 with one decimal.
   */
  public sampleCpu(): number {
    const current = sumCpuTimes(this.source.cpus());
    const percent = cpuPercent(this.lastCpu, current);
    this.lastCpu = current;
    return percent;
  }

  public sampleMemory(): MemoryState {
    const total = this.source.totalmem();
    const used = total - this.source.freemem();
    return { total, used, percent: percentOf(used, total) };
  }

  public async sampleDisk(): Promise<DiskState> {
    const stats = await statfs(this.diskPath);
    const total = stats.blocks * stats.bsize;
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    return { total, used, percent: percentOf(used, total) };
  }

  public describe(bluetoothAvailable: boolean): SystemInfo {
    const cpus = this.source.cpus();
    const platform = this.source.platform();
    return {
      platform: {
        system: PLATFORM_NAMES[platform] ?? platform,
        architecture: this.source.arch(),
        release: this.source.release(),
      },
      hostname: this.source.hostname(),
      cpu: {
        cores: cpus.length,
        threads: cpus.length,
        model: cpus[0]?.model.trim() ?? "unknown",
      },
      memory: { totalGb: Math.round((this.source.totalmem() / 1024 ** 3) * 100) / 100 },
      bluetooth: { available: bluetoothAvailable },
      agentVersion: AGENT_VERSION,
    };
  }
}

export function sumCpuTimes(cpus: readonly os.CpuInfo[]): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, idle: idleTime, irq } = cpu.times;
    idle += idleTime;
    total += user + nice + sys + idleTime + irq;
  }
  return { idle, total };
}

export function cpuPercent(previous: CpuTimes, current: CpuTimes): number {
  const totalDelta = current.total - previous.total;
  if (totalDelta <= 0) {
    return 0;
  }
  const idleDelta = current.idle - previous.idle;
  return Math.round(((totalDelta - idleDelta) / totalDelta) * 1000) / 10;
}

function percentOf(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 1000) / 10 : 0;
}
