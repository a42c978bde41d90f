import { MetricsCategory, MetricsSnapshot, MetricsValues } from "./types";

interface FieldState<K extends MetricsCategory> {
  value: MetricsValues[K] | null;
  updatedAt: number | null;
}

type FieldTable = { [K in MetricsCategory]: FieldState<K> };

export const METRICS_CATEGORIES: readonly MetricsCategory[] = [
  "cpu",
  "memory",
  "disk",
  "network",
  "battery",
  "wifi",
  "drives",
  "bluetooth",
  "brightness",
  "volume",
];

/**
 * Write handle for the categories one producer owns.
 */
export interface MetricsWriter<C extends MetricsCategory> {
  readonly owner: string;
  readonly categories: readonly C[];
  set<K extends C>(category: K, value: MetricsValues[K], at?: number): void;
}

/**
 * Latest known value of every telemetry category, each with its own capture time.
 *
 * Every category has at most one writer, claimed through `createWriter`. A value
 * stays `null` until its first refresh and is never cleared afterwards; a failed
 * refresh simply does not call `set`, leaving the stale value and its timestamp.
 * All reads hand out copies.
 */
export class MetricsStore {
  private readonly fields: FieldTable = {
    cpu: emptyField(),
    memory: emptyField(),
    disk: emptyField(),
    network: emptyField(),
    battery: emptyField(),
    wifi: emptyField(),
    drives: emptyField(),
    bluetooth: emptyField(),
    brightness: emptyField(),
    volume: emptyField(),
  };

  private readonly owners = new Map<MetricsCategory, string>();

  public createWriter<C extends MetricsCategory>(owner: string, categories: readonly C[]): MetricsWriter<C> {
    for (const category of categories) {
      const current = this.owners.get(category);
      if (current !== undefined) {
        throw new Error(`Metrics category '${category}' is already owned by '${current}'.`);
      }
    }

    for (const category of categories) {
      this.owners.set(category, owner);
    }

    const allowed = new Set<MetricsCategory>(categories);
    return {
      owner,
      categories: [...categories],
      set: (category, value, at = Date.now()) => {
        if (!allowed.has(category)) {
          throw new Error(`Writer '${owner}' does not own metrics category '${category}'.`);
        }
        this.write(category, value, at);
      },
    };
  }

  public ownerOf(category: MetricsCategory): string | null {
    return this.owners.get(category) ?? null;
  }

  public get<K extends MetricsCategory>(category: K): FieldState<K> {
    const field: FieldState<K> = this.fields[category];
    return { value: clone(field.value), updatedAt: field.updatedAt };
  }

  public snapshot(): MetricsSnapshot {
    return {
      cpu: this.get("cpu"),
      memory: this.get("memory"),
      disk: this.get("disk"),
      network: this.get("network"),
      battery: this.get("battery"),
      wifi: this.get("wifi"),
      drives: this.get("drives"),
      bluetooth: this.get("bluetooth"),
      brightness: this.get("brightness"),
      volume: this.get("volume"),
    };
  }

  private write<K extends MetricsCategory>(category: K, value: MetricsValues[K], at: number): void {
    const next: FieldState<K> = { value: clone(value), updatedAt: at };
    const fields: { [P in K]: FieldState<P> } = this.fields;
    fields[category] = next;
  }
}

function emptyField(): { value: null; updatedAt: null } {
  return { value: null, updatedAt: null };
}

function clone<T>(value: T): T {
  return value === null ? value : structuredClone(value);
}
