#!/usr/bin/env node
import * as pg from "pg";
import { newDb } from "pg-mem";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config/config.js";
import { createLogger } from "./core/log.js";
import { createDb, createPgPool } from "./db/connection.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { createJobService } from "./service/createJobService.js";
import { PostgresJobCheckpoint } from "./store/postgresCheckpoint.js";

async function createPool(): Promise<pg.Pool> {
  const url = process.env.DATABASE_URL;
  if (url) return createPgPool(url);

  const mem = newDb();
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

async function main(): Promise<void> {
  const configPath = process.env.BIO_MCP_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const config = await loadConfig(configPath);
  const logger = createLogger({ level: config.logLevel });

  const pool = await createPool();
  if (!process.env.DATABASE_URL || autoSchema) {
    await applySqlFile(pool);
  }
  const db = createDb(pool);
  const checkpoint = new PostgresJobCheckpoint(db, { logger });

  const { service, results } = createJobService(config, { checkpoint, logger });
  await results.init();
  await service.restore(checkpoint);
  service.start();

  const server = createGatewayServer({ service, logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("gateway.ready", "interproscan job gateway ready", {
    mode: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    max_concurrent_jobs: config.maxConcurrentJobs,
    timeout_seconds: config.timeoutSeconds
  });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info("gateway.stopping", `received ${signal}`);
    service
      .stop()
      .then(() => server.close())
      .then(() => db.destroy())
      .catch((err: unknown) => {
        logger.error("gateway.stop_failed", err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
