import { errorMessage } from "./errors";
import { Logger } from "./logger";

export interface ProducerContext {
  /** Fires when the cycle exceeds its timeout or the scheduler stops. */
  signal: AbortSignal;
}

export interface Producer {
  name: string;
  intervalMs: number;
  timeoutMs: number;
  idleIntervalMs?: number;
  runWhenIdle?: boolean;
  /** Delay before the first cycle after `start()`; defaults to 0. */
  startDelayMs?: number;
  run(context: ProducerContext): Promise<void>;
}

export type CycleOutcome = "completed" | "skipped" | "failed" | "timed-out";

export interface ClientCounter {
  readonly size: number;
}

interface ProducerEntry {
  producer: Producer;
  timer: NodeJS.Timeout | null;
  inFlight: AbortController | null;
}

/**
 * Runs every registered producer on its own timer chain.
 *
 * The next cycle of a producer is only armed once the previous one has
 * settled or timed out, so a producer never overlaps itself.
 */
export class ProducerScheduler {
  private readonly entries = new Map<string, ProducerEntry>();
  private running = false;

  public constructor(
    private readonly clients: ClientCounter,
    private readonly logger: Logger,
  ) {}

  public get isRunning(): boolean {
    return this.running;
  }

  public register(producer: Producer): void {
    if (this.entries.has(producer.name)) {
      throw new Error(`Producer '${producer.name}' is already registered.`);
    }

    if (producer.timeoutMs >= producer.intervalMs) {
      throw new Error(
        `Producer '${producer.name}' timeout (${producer.timeoutMs} ms) must be below its interval (${producer.intervalMs} ms).`,
      );
    }

    const entry: ProducerEntry = { producer, timer: null, inFlight: null };
    this.entries.set(producer.name, entry);

    if (this.running) {
      this.arm(entry, producer.startDelayMs ?? 0);
    }
  }

  public names(): string[] {
    return [...this.entries.keys()];
  }

  public start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    for (const entry of this.entries.values()) {
      this.arm(entry, entry.producer.startDelayMs ?? 0);
    }
    this.logger.info(`Scheduler started with ${this.entries.size} producers.`);
  }

  public stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const entry of this.entries.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
      entry.inFlight?.abort(new Error("Scheduler stopped."));
    }
    this.logger.info("Scheduler stopped.");
  }

  /**
   * Runs one cycle of the named producer outside its timer chain.
   */
  public runOnce(name: string): Promise<CycleOutcome> {
    const entry = this.entries.get(name);
    if (!entry) {
      return Promise.reject(new Error(`Unknown producer '${name}'.`));
    }
    return this.runCycle(entry);
  }

  private arm(entry: ProducerEntry, delayMs: number): void {
    entry.timer = setTimeout(() => {
      entry.timer = null;
      void this.tick(entry);
    }, delayMs);
  }

  private async tick(entry: ProducerEntry): Promise<void> {
    const outcome = await this.runCycle(entry);
    if (!this.running) {
      return;
    }

    const { producer } = entry;
    const delayMs = outcome === "skipped" ? (producer.idleIntervalMs ?? producer.intervalMs) : producer.intervalMs;
    this.arm(entry, delayMs);
  }

  private async runCycle(entry: ProducerEntry): Promise<CycleOutcome> {
    const { producer } = entry;

    if (!producer.runWhenIdle && this.clients.size === 0) {
      return "skipped";
    }

    const controller = new AbortController();
    entry.inFlight = controller;
    const startedAt = Date.now();

    const settled = producer.run({ signal: controller.signal }).then(
      (): CycleOutcome => "completed",
      (error: unknown): CycleOutcome => {
        if (!controller.signal.aborted) {
          this.logger.warn(`Producer '${producer.name}' failed: ${errorMessage(error)}`);
        }
        return "failed";
      },
    );

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<CycleOutcome>((resolvePromise) => {
      timer = setTimeout(() => {
        controller.abort(new Error(`Producer '${producer.name}' timed out.`));
        resolvePromise("timed-out");
      }, producer.timeoutMs);
    });

    try {
      const outcome = await Promise.race([settled, expired]);
      if (outcome === "timed-out") {
        this.logger.warn(`Producer '${producer.name}' abandoned after ${producer.timeoutMs} ms.`);
      } else {
        this.logger.debug(`Producer '${producer.name}' ${outcome} in ${Date.now() - startedAt} ms.`);
      }
      return outcome;
    } finally {
      clearTimeout(timer);
      if (entry.inFlight === controller) {
        entry.inFlight = null;
      }
    }
  }
}
