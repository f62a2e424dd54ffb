import { loadConfig } from "./config/client-config.js";
import { spawnLinkWorker } from "./link/link-worker.js";
import { createXmlMessageLog } from "./link/xml-log.js";
import { formatRemoteAddress } from "./link/connection.js";
import { listenInPortRange } from "./listen.js";
import { buildServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const startTime = Date.now();

  const consoleLogger = {
    info: (msg: string) => process.stdout.write(`[CSLink] ${msg}\n`),
    warn: (msg: string) => process.stderr.write(`[CSLink] WARN: ${msg}\n`),
    error: (msg: string) => process.stderr.write(`[CSLink] ERROR: ${msg}\n`),
  };

  let lastConnected: boolean | null = null;
  let onFatal: ((reason: string) => void) | null = null;

  const link = await spawnLinkWorker(config.remote, {
    connectTimeoutMs: config.connectTimeoutMs,
    sendIntervalMs: config.sendIntervalMs,
    retryDelayMs: config.retryDelayMs,
    requestDepthBits: config.requestDepthBits,
    shapeColorPriority: config.shapeColorPriority,
    logger: consoleLogger,
    xmlLog:
      config.xmlLogPath !== null
        ? createXmlMessageLog({ path: config.xmlLogPath, logger: consoleLogger })
        : undefined,
    onStateChange: (snapshot) => {
      if (snapshot.connected === lastConnected) return;
      lastConnected = snapshot.connected;
      consoleLogger.info(
        `Link state: ${snapshot.connected ? "connected" : "disconnected"}` +
        (snapshot.lastError ? `: ${snapshot.lastError}` : ""),
      );
    },
    onFault: (fault) => onFatal?.(`protocol violation (${fault.code})`),
  });

  const app = await buildServer({ config, link, startTime });

  let shuttingDown = false;

  const shutdown = async (reason: string, exitCode: number) => {
    if (shuttingDown) return;
    shuttingDown = true;

    app.log.info(`Received ${reason}, shutting down...`);
    await app.close();
    await link.close();
    process.exit(exitCode);
  };

  const exitOnFailure = (reason: string, exitCode: number) => {
    shutdown(reason, exitCode).catch(() => process.exit(1));
  };

  onFatal = (reason) => exitOnFailure(reason, 1);

  process.on("SIGINT", () => exitOnFailure("SIGINT", 0));
  process.on("SIGTERM", () => exitOnFailure("SIGTERM", 0));
  process.on("SIGHUP", () => exitOnFailure("SIGHUP", 0));

  process.on("uncaughtException", (err) => {
    process.stderr.write(`[CSLink] FATAL uncaughtException: ${err.stack ?? err.message}\n`);
    exitOnFailure("uncaughtException", 1);
  });

  process.on("unhandledRejection", (reason) => {
    process.stderr.write(`[CSLink] FATAL unhandledRejection: ${String(reason)}\n`);
    exitOnFailure("unhandledRejection", 1);
  });

  const boundPort = await listenInPortRange(app, config, consoleLogger);

  app.log.info(`CSLink status API running on ${config.host}:${boundPort}`);
  app.log.info(`Instrument: ${formatRemoteAddress(config.remote)}`);
  app.log.info(
    `Requests every ${config.sendIntervalMs}ms at ${config.requestDepthBits} bits, ` +
    `shape color: ${config.shapeColorPriority}`,
  );
  if (config.xmlLogPath !== null) {
    app.log.info(`Logging received XML to ${config.xmlLogPath}`);
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`Failed to start CSLink: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
