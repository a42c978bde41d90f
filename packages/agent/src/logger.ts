export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export class Logger {
  public constructor(
    private readonly verbose: boolean,
    private readonly scope?: string,
  ) {}

  public get isVerbose(): boolean {
    return this.verbose;
  }

  /**
   * Returns a logger sharing this logger's verbosity that prefixes every line with `[scope]`.
   */
  public child(scope: string): Logger {
    return new Logger(this.verbose, this.scope ? `${this.scope}:${scope}` : scope);
  }

  public info(message: string): void {
    this.print("INFO", message);
  }

  public warn(message: string): void {
    this.print("WARN", message);
  }

  public error(message: string): void {
    this.print("ERROR", message);
  }

  public debug(message: string): void {
    if (!this.verbose) {
      return;
    }
    this.print("DEBUG", message);
  }

  private print(level: LogLevel, message: string): void {
    const ts = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : "";
    const output = `[${ts}] [${level}]${scope} ${this.redact(message)}`;

    if (level === "ERROR") {
      console.error(output);
      return;
    }

    console.log(output);
  }

  /**
   * Redacts common secret-bearing patterns from log messages.
   *
   * Proxied requests and `run_command` payloads are logged in debug mode, so
   * this covers:
   * - Authorization headers (`Bearer ...`)
   * - URL query tokens (`?token=...`)
   * - JSON `password` / `authToken` fields
   */
  private redact(message: string): string {
    return String(message)
      .replace(/(Bearer\s+)[A-Za-z0-9._~+/=-]+/gi, "$1***REDACTED***")
      .replace(/([?&]token=)[^&\s]+/gi, "$1***REDACTED***")
      .replace(/("(?:authToken|password)"\s*:\s*")[^"]+(")/gi, "$1***REDACTED***$2");
  }
}
