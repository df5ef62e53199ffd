import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, test } from "vitest";
import { getLogger, initializeLogger, isLogLevel, log, resetLogger } from "../../services/logger";

describe("logger", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "argocd-tasks-log-"));
  });

  afterEach(() => {
    resetLogger();
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("should stay silent until initialized", () => {
    expect(getLogger()).toBeNull();
    expect(() => log.warn("ignored", "test")).not.toThrow();
  });

  test("should write JSON lines with context and data", async () => {
    const file = path.join(dir, "nested", "tasks.log");
    const logger = (await initializeLogger({ level: "warn", destination: file, sync: true }))._unsafeUnwrap();

    log.info("filtered out", "main");
    log.warn("FATA[0000] rpc error", "argocd", { reason: "decode" });
    (await logger.close())._unsafeUnwrap();

    const lines = (await fs.readFile(file, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 40,
      msg: "FATA[0000] rpc error",
      context: "argocd",
      data: { reason: "decode" },
    });
    expect(logger.getDestination()).toBe(file);
  });

  test("should recognize level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
