import { resolve } from "path";
import { Agent } from "./agent";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { Logger } from "./logger";
import { AgentConfig } from "./types";

async function main(): Promise<void> {
  // Resolve the repository root from the source location so the default
  // config path does not depend on the working directory.
  const repoRoot = resolve(__dirname, "..", "..", "..");
  const { config, configPath } = loadConfig(repoRoot);
  const logger = new Logger(config.verboseLogs);

  logger.info(`Loaded agent configuration from ${configPath}`);
  logSecurityPosture(config, logger);

  const agent = new Agent(config, logger);
  await agent.start();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down agent.`);
    await agent.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

void main().catch((error) => {
  console.error(`[agent] Fatal startup error: ${errorMessage(error)}`);
  process.exit(1);
});

function logSecurityPosture(config: AgentConfig, logger: Logger): void {
  if (!isLoopbackHost(config.bindHost)) {
    logger.warn(
      `Agent is bound to ${config.bindHost}; any peer whose origin is allowed can run shell commands on this host.`,
    );
  }

  if (config.loopbackBypass) {
    logger.info("Loopback peers bypass the origin check.");
  }
}

function isLoopbackHost(host: string): boolean {
  return host === "127.0.0.1" || host === "::1" || host === "localhost";
}
