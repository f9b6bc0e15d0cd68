import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createLogger } from "../src/logging/logger.js";
import { createMemoryLogger } from "./helpers.js";

describe("createLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "logger-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes timestamp, level and message as one JSON line", () => {
    const { logger, entries } = createMemoryLogger();

    logger.info({ count: 2 }, "Read 2 repositories from repos.txt");

    const [entry] = entries();
    expect(entry).toMatchObject({
      level: "info",
      msg: "Read 2 repositories from repos.txt",
      count: 2,
    });
    expect(typeof entry?.time).toBe("string");
    expect(new Date(String(entry?.time)).toISOString()).toBe(entry?.time);
  });

  it("redacts secrets", () => {
    const { logger, entries } = createMemoryLogger();

    logger.info({ credentials: { destToken: "test-token" }, sourceSecret: "test-secret" }, "loaded");

    expect(entries()[0]).toMatchObject({
      credentials: { destToken: "***" },
      sourceSecret: "***",
    });
  });

  it("appends to an existing log file", async () => {
    const file = join(dir, "logs", "migration.log");
    const first = createLogger({ level: "info", file });
    first.info("first run");
    const second = createLogger({ level: "info", file });
    second.warn("second run");

    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(["first run", "second run"]);
    expect(JSON.parse(lines[1] ?? "{}").level).toBe("warn");
  });

  it("keeps what was already in the file", async () => {
    const file = join(dir, "existing.log");
    await writeFile(file, '{"msg":"earlier"}\n');

    createLogger({ level: "info", file }).info("later");

    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "{}").msg).toBe("earlier");
  });

  it("filters below the configured level", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", destination: { write: (line: string) => void lines.push(line) } });

    logger.info("hidden");
    logger.error("shown");

    expect(lines).toHaveLength(1);
  });
});
