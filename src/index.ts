#!/usr/bin/env node
import path from "path";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { applySchema } from "./db/bootstrap.js";
import { openDatabase } from "./db/connection.js";
import { ContainerStrategy } from "./execution/backends/containerStrategy.js";
import { DockerCliRuntime } from "./execution/backends/dockerCliRuntime.js";
import { LocalProcessStrategy } from "./execution/backends/localProcess.js";
import { logger } from "./logger.js";
import { envSnapshot } from "./mcp/envSnapshot.js";
import { createTestServer } from "./mcp/testServer.js";
import { PolicyEngine } from "./policy/policy.js";
import { RunCoordinator } from "./runs/coordinator.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const policyPath = process.env.TESTRELAY_POLICY_PATH ?? "policies/default.policy.yaml";
  const runsDir = path.resolve(process.env.RUNS_DIR ?? "var/runs");
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const policy = await PolicyEngine.loadFromFile(policyPath);
  const { pool, db, mode: storeMode } = openDatabase(process.env.DATABASE_URL);
  // pg-mem starts empty, so it always needs the schema
  if (storeMode === "pg-mem" || autoSchema) {
    await applySchema(pool);
  }

  const store = new PostgresStore(db);
  const coordinator = new RunCoordinator({
    store,
    policy,
    runsDir,
    strategies: {
      local: new LocalProcessStrategy(),
      container: new ContainerStrategy(new DockerCliRuntime())
    },
    environment: () => envSnapshot(runsDir, storeMode)
  });

  const server = createTestServer({ policy, coordinator, store });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ policy: policyPath, policy_hash: policy.policyHash, store_mode: storeMode }, "testrelay ready");

  let stopping = false;
  const stop = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");
    coordinator
      .shutdown()
      .then(() => server.close())
      .then(() => pool.end())
      .catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "testrelay failed to start");
  process.exitCode = 1;
});
