import { execFile } from "child_process";
import { ConcurrencyLimiter } from "./limiter";
import { Logger } from "./logger";
import { CommandResult } from "./types";

const MAX_OUTPUT_BYTES = 1024 * 1024;

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface ExecOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  shell: boolean;
}

/**
 * Subset of the error `execFile` hands to its callback.
 */
export interface ExecFailure {
  message: string;
  name?: string;
  code?: string | number | null;
  killed?: boolean;
  signal?: string | null;
}

export interface ExecOutcome {
  error: ExecFailure | null;
  stdout: string;
  stderr: string;
}

export type ExecFn = (file: string, args: readonly string[], options: ExecOptions) => Promise<ExecOutcome>;

/**
 * Runs external tools and shell commands with a timeout and a bounded number
 * of concurrent child processes. Failures come back as values, never as
 * rejections.
 */
export class CommandRunner {
  private readonly limiter: ConcurrencyLimiter;

  public constructor(
    private readonly defaultTimeoutMs: number,
    maxConcurrent: number,
    private readonly logger: Logger,
    private readonly exec: ExecFn = execFileOutcome,
  ) {
    this.limiter = new ConcurrencyLimiter(maxConcurrent);
  }

  public run(argv: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    if (argv.length === 0) {
      return Promise.resolve({ success: false, error: "Empty command." });
    }

    const [file, ...args] = argv;
    return this.execute(file, args, false, options);
  }

  public runShell(command: string, options: RunOptions = {}): Promise<CommandResult> {
    return this.execute(command, [], true, options);
  }

  private async execute(file: string, args: string[], shell: boolean, options: RunOptions): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    if (options.signal?.aborted) {
      return { success: false, error: "Command aborted" };
    }

    return this.limiter.run(async () => {
      const startedAt = Date.now();
      const outcome = await this.exec(file, args, { timeoutMs, signal: options.signal, shell });
      const result = toCommandResult(file, timeoutMs, outcome);

      this.logger.debug(
        `${shell ? "sh" : "exec"} ${file}${args.length ? ` ${args.join(" ")}` : ""} -> ${
          result.success ? "ok" : (result.error ?? `exit ${result.exitCode}`)
        } in ${Date.now() - startedAt} ms`,
      );
      return result;
    });
  }
}

export function toCommandResult(file: string, timeoutMs: number, outcome: ExecOutcome): CommandResult {
  const stdout = outcome.stdout.trim();
  const stderr = outcome.stderr.trim();
  const error = outcome.error;

  if (!error) {
    return { success: true, stdout, stderr, exitCode: 0 };
  }

  if (error.code === "ABORT_ERR" || error.name === "AbortError") {
    return { success: false, error: "Command aborted" };
  }

  if (error.code === "ENOENT") {
    return { success: false, error: `Command not found: ${file}` };
  }

  if (error.killed && error.signal === "SIGTERM") {
    return { success: false, error: `Command timeout (${timeoutMs / 1000}s)` };
  }

  if (typeof error.code === "number") {
    return { success: false, stdout, stderr, exitCode: error.code };
  }

  return { success: false, stdout, stderr, error: error.message };
}

function execFileOutcome(file: string, args: readonly string[], options: ExecOptions): Promise<ExecOutcome> {
  return new Promise((resolve) => {
    execFile(
      file,
      args,
      {
        encoding: "utf8",
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        signal: options.signal,
        shell: options.shell,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        resolve({ error, stdout, stderr });
      },
    );
  });
}
