import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, createSilentLogger } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("writes JSON lines to the sink and mirrors them to the log file", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "nested", "network.log");
    const lines: string[] = [];

    try {
      const logger = new StructuredLogger({ logFile, component: "queries", sink: (line) => lines.push(line) });
      logger.info("network_cache_miss", { key: "path::A::C" });
      logger.warn("network_store_retry", { attempt: 1 });
      await logger.flush();

      expect(lines).to.have.length(2);
      const first: unknown = JSON.parse(lines[0] ?? "{}");
      expect(first).to.include({ level: "info", message: "network_cache_miss", component: "queries" });
      expect(first).to.have.deep.property("payload", { key: "path::A::C" });

      const mirrored = await readFile(logFile, "utf8");
      expect(mirrored).to.equal(lines.join(""));
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("drops entries below the minimum level", () => {
    const messages: string[] = [];
    const logger = new StructuredLogger({ minLevel: "warn", sink: () => undefined, onEntry: (entry) => messages.push(entry.message) });
    logger.debug("network_cache_hit");
    logger.info("network_cache_invalidated");
    logger.warn("network_fanout_exceeds_cap");
    logger.error("network_tool_failed");
    expect(messages).to.deep.equal(["network_fanout_exceeds_cap", "network_tool_failed"]);
  });

  it("redacts sensitive keys when enabled", () => {
    const payloads: unknown[] = [];
    const logger = new StructuredLogger({
      redactionEnabled: true,
      sink: () => undefined,
      onEntry: (entry) => payloads.push(entry.payload),
    });
    logger.info("network_journal_replayed", { token: "test-secret", nested: [{ Password: "test-secret", applied: 3 }] });
    expect(payloads).to.deep.equal([{ token: "[REDACTED]", nested: [{ Password: "[REDACTED]", applied: 3 }] }]);
  });

  it("stamps the child component while sharing the listener", () => {
    const components: Array<string | undefined> = [];
    const logger = new StructuredLogger({ sink: () => undefined, onEntry: (entry) => components.push(entry.component) });
    logger.child("coordinator").info("network_cache_invalidated");
    logger.info("stdio_listening");
    expect(components).to.deep.equal(["coordinator", undefined]);
  });

  it("provides a silent logger that emits nothing below error", () => {
    const logger = createSilentLogger();
    expect(() => logger.warn("ignored")).to.not.throw();
  });
});
