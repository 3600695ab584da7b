import os from "os";

import chalk from "chalk";
import stringWidth from "string-width";

import { validateConfig } from "./config.js";
import { HEALTH_ENDPOINTS, OLLAMA_ENDPOINTS } from "./constants/endpoints.js";
import { logger } from "./logging/index.js";
import { createApp } from "./server/app.js";
import { configService, createUpstreamService, RequestCounters, RetryExecutor } from "./services/index.js";

import type { Server } from "http";

validateConfig();

const PROXY_PORT = configService.getProxyPort();
const PROXY_HOST = configService.getProxyHost();
const upstreamSettings = configService.getUpstreamSettings();

const counters = new RequestCounters();
const upstream = createUpstreamService(upstreamSettings, {
  counters,
  retryExecutor: new RetryExecutor({ policy: configService.getRetryPolicy(), counters }),
});
const { app } = createApp({
  upstream,
  ollamaVersion: configService.getOllamaVersion(),
  config: configService.getConfigSummary(),
});

function getNetworkIP(): string {
  const interfaces = os.networkInterfaces();
  for (const name of Object.keys(interfaces)) {
    const networkInterface = interfaces[name];
    if (networkInterface) {
      for (const net of networkInterface) {
        if (net.family === "IPv4" && !net.internal) {
          return net.address;
        }
      }
    }
  }
  return "localhost";
}

const BOX_WIDTH = 55;

const BOX_CHAR = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  leftT: "├",
  rightT: "┤",
};

function createAlignedLine(text: string): string {
  const textWidth = stringWidth(text);
  const padding = Math.max(0, BOX_WIDTH - 2 - textWidth);
  const leftPadding = Math.floor(padding / 2);
  const rightPadding = padding - leftPadding;

  return (
    chalk.bold.blue(BOX_CHAR.vertical) +
    " ".repeat(leftPadding) +
    text +
    " ".repeat(rightPadding) +
    chalk.bold.blue(BOX_CHAR.vertical)
  );
}

function border(left: string, right: string): string {
  return chalk.bold.blue(left + BOX_CHAR.horizontal.repeat(BOX_WIDTH - 2) + right);
}

function printBanner(port: number, host: string): void {
  const separator = border(BOX_CHAR.leftT, BOX_CHAR.rightT);

  logger.info("");
  logger.info(border(BOX_CHAR.topLeft, BOX_CHAR.topRight));
  logger.info(createAlignedLine(chalk.bold.green("Ollama API Shim") + chalk.dim(" - OpenAI-compatible backend")));
  logger.info(createAlignedLine(chalk.dim(`Running on port: ${port}`)));
  logger.info(createAlignedLine(chalk.dim(`Binding address: ${host}`)));
  logger.info(createAlignedLine(chalk.cyan("Upstream: ") + chalk.green(upstreamSettings.baseUrl)));

  logger.info(separator);
  logger.info(createAlignedLine(chalk.magenta("Available Endpoints:")));
  for (const endpoint of Object.values(OLLAMA_ENDPOINTS)) {
    logger.info(createAlignedLine(chalk.cyan(`  • ${endpoint}`)));
  }
  logger.info(createAlignedLine(chalk.cyan(`  • ${HEALTH_ENDPOINTS.HEALTH}, ${HEALTH_ENDPOINTS.READY}, ${HEALTH_ENDPOINTS.LIVE}, ${HEALTH_ENDPOINTS.METRICS}`)));
  logger.info(createAlignedLine(chalk.cyan(`  • ${HEALTH_ENDPOINTS.UPSTREAM_HEALTH}, ${HEALTH_ENDPOINTS.CONFIG_VALIDATE}`)));

  logger.info(separator);
  logger.info(createAlignedLine(chalk.magenta("Access URLs:")));
  logger.info(createAlignedLine(chalk.cyan(`  Local:   http://localhost:${port}/`)));
  logger.info(createAlignedLine(chalk.cyan(`  Network: http://${getNetworkIP()}:${port}/`)));
  logger.info(border(BOX_CHAR.bottomLeft, BOX_CHAR.bottomRight) + "\n");
}

const server: Server = app.listen(PROXY_PORT, PROXY_HOST, () => {
  const addressInfo = server.address();
  const port = typeof addressInfo === "object" && addressInfo !== null ? addressInfo.port : PROXY_PORT;
  const host = typeof addressInfo === "object" && addressInfo !== null ? addressInfo.address : PROXY_HOST;
  printBanner(port, host);
});

server.on("error", (error: NodeJS.ErrnoException) => {
  if (error.syscall !== "listen") {
    throw error;
  }

  const bind = `Port ${PROXY_PORT}`;
  switch (error.code) {
    case "EACCES":
      logger.error(`\n[ERROR] ${bind} requires elevated privileges.`);
      process.exit(1);
      break;
    case "EADDRINUSE":
      logger.error(`\n[ERROR] ${bind} is already in use.`);
      process.exit(1);
      break;
    default:
      throw error;
  }
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`[SERVER] Received ${signal}, shutting down`);

  await new Promise<void>((resolve) => {
    server.close(() => resolve());
    server.closeAllConnections();
  });
  await upstream.close();
  logger.info("[SERVER] Shutdown complete");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("[SERVER] Shutdown failed:", error);
        process.exit(1);
      });
  });
}
