import WebSocket from "ws";
import { ServerEvent } from "../../shared/src/contracts";
import { errorMessage } from "./errors";
import { Logger } from "./logger";
import { PushClient } from "./types";

export type ClientListener = (client: PushClient) => void;

export interface ClientRegistryOptions {
  /** A send still unsettled after this long counts as failed. */
  deliveryTimeoutMs?: number;
}

const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;
const MAX_BUFFERED_BYTES = 4 * 1024 * 1024;

/**
 * In-memory set of connected push-channel clients.
 *
 * Producers and the dispatcher only talk to clients through this registry.
 * A client whose delivery fails or stalls is dropped.
 */
export class ClientRegistry {
  private readonly clients = new Map<string, PushClient>();
  private readonly joinListeners: ClientListener[] = [];
  private readonly deliveryTimeoutMs: number;

  public constructor(
    private readonly logger: Logger,
    options: ClientRegistryOptions = {},
  ) {
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
  }

  public get size(): number {
    return this.clients.size;
  }

  public register(client: PushClient): void {
    this.clients.set(client.id, client);
    this.logger.info(`Client ${client.id} connected from ${client.remoteAddress} (${this.clients.size} active).`);
    for (const listener of this.joinListeners) {
      listener(client);
    }
  }

  public onClientJoined(listener: ClientListener): void {
    this.joinListeners.push(listener);
  }

  public unregister(client: PushClient): boolean {
    const current = this.clients.get(client.id);
    if (current !== client) {
      return false;
    }

    this.clients.delete(client.id);
    this.logger.info(`Client ${client.id} disconnected (${this.clients.size} active).`);
    return true;
  }

  public has(client: PushClient): boolean {
    return this.clients.get(client.id) === client;
  }

  public list(): PushClient[] {
    return [...this.clients.values()];
  }

  /**
   * Sends one event to every client registered when the call starts. Every
   * send is issued before the first await, so callers need not wait for the
   * result. Resolves with the number of successful deliveries; never rejects.
   */
  public async broadcast(event: ServerEvent): Promise<number> {
    const targets = this.list();
    if (targets.length === 0) {
      return 0;
    }

    const frame = JSON.stringify(event);
    const results = await Promise.allSettled(targets.map((client) => this.deliver(client, frame)));

    let delivered = 0;
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        delivered += 1;
        return;
      }
      this.drop(targets[index], event.cmd, result.reason);
    });

    return delivered;
  }

  public async sendTo(client: PushClient, event: ServerEvent): Promise<boolean> {
    if (!this.has(client)) {
      return false;
    }

    try {
      await this.deliver(client, JSON.stringify(event));
      return true;
    } catch (error) {
      this.drop(client, event.cmd, error);
      return false;
    }
  }

  private deliver(client: PushClient, frame: string): Promise<void> {
    return new Promise<void>((resolvePromise, rejectPromise) => {
      const timer = setTimeout(() => {
        rejectPromise(new Error(`Delivery timed out after ${this.deliveryTimeoutMs} ms.`));
      }, this.deliveryTimeoutMs);
      timer.unref();

      client.send(frame).then(
        () => {
          clearTimeout(timer);
          resolvePromise();
        },
        (error: unknown) => {
          clearTimeout(timer);
          rejectPromise(error);
        },
      );
    });
  }

  private drop(client: PushClient, cmd: string, reason: unknown): void {
    this.logger.debug(`Delivery of '${cmd}' to ${client.id} failed: ${errorMessage(reason)}`);
    this.unregister(client);
  }
}

/**
 * Adapts a `ws` socket to the registry's client shape.
 */
export class WsPushClient implements PushClient {
  public constructor(
    public readonly id: string,
    public readonly remoteAddress: string,
    public readonly origin: string,
    private readonly socket: WebSocket,
  ) {}

  public send(data: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("Socket is not open."));
    }
    if (this.socket.bufferedAmount > MAX_BUFFERED_BYTES) {
      return Promise.reject(new Error(`Send buffer above ${MAX_BUFFERED_BYTES} bytes.`));
    }

    return new Promise<void>((resolvePromise, rejectPromise) => {
      this.socket.send(data, (error) => {
        if (error) {
          rejectPromise(error);
          return;
        }
        resolvePromise();
      });
    });
  }
}
