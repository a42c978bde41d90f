import { errorMessage } from "./errors";
import { Logger } from "./logger";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface AccessPolicyOptions {
  originsUrl: string;
  baselineOrigins: readonly string[];
  loopbackBypass: boolean;
  fetchTimeoutMs: number;
  fetchImpl?: FetchFn;
}

const LOOPBACK_ADDRESSES = new Set(["127.0.0.1", "::1", "::ffff:127.0.0.1"]);
const LOCAL_DEV_ORIGIN = /^http:\/\/(localhost|127\.0\.0\.1):\d+$/;

/**
 * Origin-based access decision shared by the HTTP surface and the push channel.
 *
 * The allowed set starts as the baseline and is replaced wholesale by every
 * successful refresh from the remote registry.
 */
export class AccessPolicy {
  private allowed: Set<string>;
  private refreshedAt: number | null = null;
  private readonly fetchImpl: FetchFn;

  public constructor(
    private readonly options: AccessPolicyOptions,
    private readonly logger: Logger,
  ) {
    this.allowed = new Set(options.baselineOrigins);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public get origins(): string[] {
    return [...this.allowed];
  }

  public get updatedAt(): number | null {
    return this.refreshedAt;
  }

  public isPermitted(remoteAddress: string | undefined, origin: string | undefined): boolean {
    if (this.options.loopbackBypass && remoteAddress && LOOPBACK_ADDRESSES.has(remoteAddress)) {
      return true;
    }

    if (!origin) {
      return false;
    }

    if (LOCAL_DEV_ORIGIN.test(origin)) {
      return true;
    }

    return this.allowed.has(origin);
  }

  /**
   * Pulls the remote origin list. Resolves `false` and keeps the current set
   * on any failure.
   */
  public async refresh(signal?: AbortSignal): Promise<boolean> {
    const timeout = AbortSignal.timeout(this.options.fetchTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let body: unknown;
    try {
      const response = await this.fetchImpl(this.options.originsUrl, { signal: combined });
      if (!response.ok) {
        this.logger.debug(`Origin registry answered HTTP ${response.status}; keeping ${this.allowed.size} origins.`);
        return false;
      }
      body = await response.json();
    } catch (error) {
      this.logger.debug(`Origin registry unreachable: ${errorMessage(error)}`);
      return false;
    }

    const remote = extractOrigins(body);
    if (!remote) {
      this.logger.debug("Origin registry payload has no 'origins' array; keeping current set.");
      return false;
    }

    this.allowed = new Set([...remote, ...this.options.baselineOrigins]);
    this.refreshedAt = Date.now();
    this.logger.debug(`Allowed origins refreshed (${this.allowed.size} entries).`);
    return true;
  }
}

function extractOrigins(body: unknown): string[] | null {
  if (!body || typeof body !== "object" || Array.isArray(body) || !("origins" in body)) {
    return null;
  }

  const origins = body.origins;
  if (!Array.isArray(origins)) {
    return null;
  }

  return origins.filter((entry): entry is string => typeof entry === "string");
}
