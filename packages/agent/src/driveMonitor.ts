import { createEvent, DriveChangeType, ServerEvent } from "../../shared/src/contracts";
import { errorMessage } from "./errors";
import { attachListings } from "./fsListing";
import { HostControl } from "./hostControl";
import { Logger } from "./logger";
import { MetricsStore, MetricsWriter } from "./metricsStore";
import { DriveActionResult, DriveRecord, PushClient } from "./types";

/** Resolves `null` when the drive scan failed. */
export type DriveFetcher = (signal?: AbortSignal) => Promise<DriveRecord[] | null>;

export interface DriveEventSink {
  broadcast(event: ServerEvent): Promise<number>;
  sendTo(client: PushClient, event: ServerEvent): Promise<boolean>;
}

/**
 * Detects removable drives appearing and disappearing by diffing the device
 * identifiers of consecutive polls.
 *
 * A failed scan is not an empty drive list: it leaves the cached drives, the
 * previous identifiers and any pending initial requests as they were.
 */
export class DriveMonitor {
  private previous = new Set<string>();
  private readonly pendingInitial = new Set<PushClient>();
  private scanFailing = false;

  public constructor(
    private readonly fetchDrives: DriveFetcher,
    private readonly writer: MetricsWriter<"drives">,
    private readonly events: DriveEventSink,
    private readonly logger: Logger,
  ) {}

  /**
   * Asks the next successful poll to send `client` the full drive list
   * tagged `initial`.
   */
  public requestInitial(client: PushClient): void {
    this.pendingInitial.add(client);
  }

  public get knownIdentifiers(): string[] {
    return [...this.previous];
  }

  /**
   * One monitor cycle. Returns the change types emitted, in order.
   */
  public async poll(signal?: AbortSignal): Promise<DriveChangeType[]> {
    const drives = await this.fetchDrives(signal);
    if (!drives) {
      if (!this.scanFailing) {
        this.logger.warn("Drive scan failed; keeping the last known drive list.");
      }
      this.scanFailing = true;
      return [];
    }
    if (this.scanFailing) {
      this.logger.info("Drive scan recovered.");
      this.scanFailing = false;
    }

    this.writer.set("drives", drives);

    const current = driveIdentifiers(drives);
    const emitted: DriveChangeType[] = [];

    if (this.pendingInitial.size > 0) {
      const event = createEvent("drives_update", { drives, change_type: "initial" });
      for (const client of this.pendingInitial) {
        void this.events.sendTo(client, event);
      }
      this.pendingInitial.clear();
      emitted.push("initial");
    }

    // An empty previous set means nothing to compare against yet.
    if (this.previous.size > 0 && !sameMembers(this.previous, current)) {
      const removed = [...this.previous].filter((id) => !current.has(id));
      const added = [...current].filter((id) => !this.previous.has(id));

      if (removed.length > 0) {
        this.logger.info(`Drives removed: ${removed.join(", ")}`);
      }
      if (added.length > 0) {
        this.logger.info(`Drives added: ${added.join(", ")}`);
      }

      const refetched = await this.fetchDrives(signal);
      const updated = refetched ?? drives;
      if (refetched) {
        this.writer.set("drives", refetched);
      }

      const changeType: DriveChangeType = removed.length > 0 ? "removal" : "addition";
      this.announce(updated, changeType);
      emitted.push(changeType);
    }

    this.previous = current;
    return emitted;
  }

  private announce(drives: DriveRecord[], changeType: DriveChangeType): void {
    void this.events
      .broadcast(createEvent("drives_update", { drives, change_type: changeType }))
      .then(
        (delivered) => {
          this.logger.debug(`drives_update (${changeType}, ${drives.length} drives) delivered to ${delivered} clients.`);
        },
        (error: unknown) => {
          this.logger.warn(`drives_update (${changeType}) broadcast failed: ${errorMessage(error)}`);
        },
      );
  }
}

export interface AutoMountAttempt {
  device: string;
  result: DriveActionResult;
}

/**
 * Mounts removable volumes that show up unmounted.
 *
 * Each volume is tried once per attachment: a volume the user unmounted, or
 * one whose mount failed, is left alone until it disappears from the host.
 */
export class DriveAutoMounter {
  private readonly attempted = new Set<string>();

  public constructor(
    private readonly host: Pick<HostControl, "listUnmountedDrives" | "mountDrive">,
    private readonly logger: Logger,
  ) {}

  public async mountNew(mounted: ReadonlySet<string>, signal?: AbortSignal): Promise<AutoMountAttempt[]> {
    const unmounted = await this.host.listUnmountedDrives(signal);
    if (!unmounted) {
      return [];
    }

    const present = new Set([...mounted, ...unmounted.map((drive) => drive.deviceNode)]);
    for (const device of this.attempted) {
      if (!present.has(device)) {
        this.attempted.delete(device);
      }
    }

    const attempts: AutoMountAttempt[] = [];
    for (const drive of unmounted) {
      if (signal?.aborted || this.attempted.has(drive.deviceNode)) {
        continue;
      }

      this.attempted.add(drive.deviceNode);
      this.logger.info(`Auto-mounting ${drive.name} (${drive.deviceNode}).`);
      const result = await this.host.mountDrive(drive.deviceNode);
      if (!result.success) {
        this.logger.warn(`Auto-mount of ${drive.deviceNode} failed: ${result.error ?? "unknown error"}`);
      }
      attempts.push({ device: drive.deviceNode, result });
    }

    return attempts;
  }
}

export function driveIdentifiers(drives: readonly DriveRecord[]): Set<string> {
  return new Set(drives.map((drive) => drive.deviceNode).filter((id) => id.length > 0));
}

/**
 * Device nodes of every mounted volume, partitions included.
 */
export function mountedDevices(drives: readonly DriveRecord[]): Set<string> {
  return new Set(drives.flatMap((drive) => [drive.deviceNode, ...drive.mountPoints.map((mount) => mount.device)]));
}

/**
 * A fresh listing with directory contents, or the cached drives when the
 * scan fails.
 */
export async function listDrivesOrCached(
  host: Pick<HostControl, "listDrives">,
  store: Pick<MetricsStore, "get">,
): Promise<DriveRecord[]> {
  const drives = await host.listDrives();
  return drives ? attachListings(drives) : (store.get("drives").value ?? []);
}

function sameMembers(left: ReadonlySet<string>, right: ReadonlySet<string>): boolean {
  if (left.size !== right.size) {
    return false;
  }
  for (const value of left) {
    if (!right.has(value)) {
      return false;
    }
  }
  return true;
}
