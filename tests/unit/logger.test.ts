import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../../src/logger.js";
import { ProviderError } from "../../src/providers/errors.js";

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "sampler.log");

    try {
      const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 256, maxFileCount: 3, echo: false });
      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = (await readdir(directory)).sort();
      expect(files).to.deep.equal(["sampler.log", "sampler.log.1", "sampler.log.2"]);
      const archived = await readFile(path.join(directory, "sampler.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("mirrors entries as JSON lines into nested directories", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "logs", "run.log");
    try {
      const logger = new StructuredLogger({ logFile, echo: false });
      logger.info("first", { value: 1 });
      logger.warn("second");
      await logger.flush();

      const lines = (await readFile(logFile, "utf8")).trim().split("\n");
      const messages = lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === "object" && parsed !== null && "message" in parsed ? parsed.message : null;
      });
      expect(messages).to.deep.equal(["first", "second"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("drops entries below the configured level", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ level: "warn", echo: false, onEntry: (entry) => entries.push(entry) });
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown_too");
    expect(entries.map((entry) => entry.message)).to.deep.equal(["shown", "shown_too"]);
    expect(logger.isLevelEnabled("info")).to.equal(false);
  });

  it("merges child bindings into payloads", () => {
    const entries: LogEntry[] = [];
    const root = new StructuredLogger({ echo: false, onEntry: (entry) => entries.push(entry) });
    const child = root.child({ language: "fr" }).child({ stage: "crawl" });

    child.info("with_object", { id: "B", stage: "override" });
    child.info("without_payload");
    child.info("scalar", 3);

    expect(entries.map((entry) => entry.payload)).to.deep.equal([
      { language: "fr", stage: "override", id: "B" },
      { language: "fr", stage: "crawl" },
      { language: "fr", stage: "crawl", value: 3 },
    ]);
  });

  it("serialises errors with their code", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ echo: false, onEntry: (entry) => entries.push(entry) });
    logger.error("failed", { error: new ProviderError("throttled") });
    logger.error("bare", new RangeError("out of range"));

    expect(entries[0]?.payload).to.deep.equal({
      error: { name: "ProviderError", message: "throttled", code: "E-KG-PROVIDER" },
    });
    expect(entries[1]?.payload).to.deep.equal({ name: "RangeError", message: "out of range" });
  });

  it("does not create files without a log file", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const logger = new StructuredLogger({ logFile: null, echo: false });
      logger.warn("no_file");
      await logger.flush();
      expect(await readdir(directory)).to.deep.equal([]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
