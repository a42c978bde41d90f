import { BluetoothDeviceRecord } from "./types";

export const INACTIVE_RSSI = -100;

export interface BluetoothSighting {
  address: string;
  name?: string;
  rssi?: number | null;
  connected?: boolean;
}

export interface PairedDevice {
  address: string;
  name?: string;
  connected: boolean;
}

/**
 * Keyed table of Bluetooth devices seen by scans and by paired-device enumeration.
 */
export class BluetoothTable {
  private readonly devices = new Map<string, BluetoothDeviceRecord>();

  public get size(): number {
    return this.devices.size;
  }

  public get(address: string): BluetoothDeviceRecord | null {
    const record = this.devices.get(address.toUpperCase());
    return record ? { ...record } : null;
  }

  public upsertScan(sightings: readonly BluetoothSighting[], now = Date.now()): void {
    for (const sighting of sightings) {
      const address = sighting.address.toUpperCase();
      const existing = this.devices.get(address);

      this.devices.set(address, {
        address,
        name: pickName(sighting.name, existing?.name, address),
        rssi: sighting.rssi ?? existing?.rssi ?? INACTIVE_RSSI,
        paired: existing?.paired ?? false,
        connected: sighting.connected ?? existing?.connected ?? false,
        nearby: true,
        lastSeen: now,
      });
    }
  }

  /**
   * Merges the paired-device list. A paired device is only marked nearby when
   * it is currently connected; otherwise it keeps whatever the last scan saw.
   */
  public upsertPaired(paired: readonly PairedDevice[], now = Date.now()): void {
    const pairedAddresses = new Set<string>();

    for (const device of paired) {
      const address = device.address.toUpperCase();
      pairedAddresses.add(address);
      const existing = this.devices.get(address);

      this.devices.set(address, {
        address,
        name: pickName(device.name, existing?.name, address),
        rssi: existing?.rssi ?? INACTIVE_RSSI,
        paired: true,
        connected: device.connected,
        nearby: device.connected || (existing?.nearby ?? false),
        lastSeen: device.connected ? now : (existing?.lastSeen ?? now),
      });
    }

    for (const record of this.devices.values()) {
      if (record.paired && !pairedAddresses.has(record.address)) {
        record.paired = false;
        record.connected = false;
      }
    }
  }

  /**
   * Ages out records not seen within `ttlMs`. Unpaired ones are removed; paired
   * ones stay listed as out of range.
   */
  public expire(now: number, ttlMs: number): string[] {
    const evicted: string[] = [];

    for (const [address, record] of this.devices) {
      if (now - record.lastSeen <= ttlMs) {
        continue;
      }

      if (record.paired) {
        record.nearby = false;
        record.rssi = INACTIVE_RSSI;
        continue;
      }

      this.devices.delete(address);
      evicted.push(address);
    }

    return evicted;
  }

  public list(): BluetoothDeviceRecord[] {
    return [...this.devices.values()]
      .map((record) => ({ ...record }))
      .sort((left, right) => right.rssi - left.rssi || left.name.localeCompare(right.name));
  }
}

function pickName(incoming: string | undefined, existing: string | undefined, address: string): string {
  const trimmed = incoming?.trim();
  if (trimmed && trimmed !== address && trimmed.replace(/-/g, ":").toUpperCase() !== address) {
    return trimmed;
  }
  return existing ?? address;
}
