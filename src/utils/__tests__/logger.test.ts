import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { configureLogging, createLogger, logChat, loggingFlags } from "../logger.js";

const DEFAULTS = { info: true, warning: true, error: true, chat: true, debug: false, file: undefined };

describe("logger", () => {
  afterEach(() => {
    configureLogging(DEFAULTS);
  });

  it("applies flags to loggers created earlier", () => {
    createLogger("early");
    configureLogging({ info: false, debug: true });

    expect(loggingFlags()).toMatchObject({ info: false, debug: true, warning: true });
  });

  it("appends enabled levels to the log file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "murmur-log-"));
    const file = join(dir, "logs", "murmur.log");
    try {
      configureLogging({ file, info: true, warning: false });
      const log = createLogger("file-test");

      log.info("kept line");
      log.warn("dropped line");
      logChat("group:20002 alice(10001): hello");

      const content = await readFile(file, "utf-8");
      expect(content).toContain("kept line");
      expect(content).not.toContain("dropped line");
      expect(content).toContain("group:20002 alice(10001): hello");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("suppresses chat lines when chat logging is off", async () => {
    const dir = await mkdtemp(join(tmpdir(), "murmur-log-"));
    const file = join(dir, "murmur.log");
    try {
      configureLogging({ file, chat: false });
      logChat("secret chatter");
      createLogger("marker").info("marker line");

      const content = await readFile(file, "utf-8");
      expect(content).toContain("marker line");
      expect(content).not.toContain("secret chatter");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
