import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadEngineConfig } from "./config/engine.js";
import { StructuredLogger } from "./logger.js";
import { createNetworkServer } from "./mcp/networkTools.js";
import { createNetworkEngine } from "./network/engine.js";

export * from "./index.js";
export { createNetworkServer, registerNetworkTools } from "./mcp/networkTools.js";

/**
 * Starts the MCP server over stdio. Logs go to stderr because stdout carries
 * the protocol frames.
 */
async function main(): Promise<void> {
  const config = loadEngineConfig(process.env);
  const logger = new StructuredLogger({
    logFile: config.logFile,
    minLevel: config.logLevel,
    component: "server",
    sink: (line) => process.stderr.write(line),
  });

  const engine = await createNetworkEngine({ config, logger });
  const server = createNetworkServer(engine);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("stdio_listening", {
    depth_ceiling: config.depthCeiling,
    cache_ttl_ms: config.cacheTtlMs,
    journal: config.journalPath,
    replayed: engine.replay.applied,
  });

  process.on("SIGINT", async () => {
    logger.warn("shutdown_signal", { signal: "SIGINT" });
    try {
      await server.close();
      await engine.close();
    } catch (error) {
      logger.error("shutdown_failed", { message: error instanceof Error ? error.message : String(error) });
    }
    process.exit(0);
  });
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${JSON.stringify({ level: "error", message: "server_start_failed", payload: { message: error instanceof Error ? error.message : String(error) } })}\n`);
    process.exit(1);
  });
}
