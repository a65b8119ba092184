import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createAppLogger, createNullLogger } from "./logger.js";

describe("AppLogger", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "contacts-log-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes structured JSONL records", () => {
    const logger = createAppLogger(tempDir);
    const err = new Error("boom");

    logger.info("command", { command: "add" });
    logger.error("failed", err);

    const today = new Date().toISOString().split("T")[0];
    const logPath = path.join(tempDir, "logs", `${today}.jsonl`);
    expect(fs.existsSync(logPath)).toBe(true);

    const lines = fs.readFileSync(logPath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);

    const first = JSON.parse(lines[0]) as {
      timestamp: string;
      level: string;
      message: string;
      args: Array<{ command?: string }>;
    };
    expect(first.timestamp).toBeDefined();
    expect(first.level).toBe("info");
    expect(first.message).toBe("command");
    expect(first.args[0].command).toBe("add");

    const second = JSON.parse(lines[1]) as {
      level: string;
      message: string;
      args: Array<{ name?: string; message?: string; stack?: string }>;
    };
    expect(second.level).toBe("error");
    expect(second.message).toBe("failed");
    expect(second.args[0].name).toBe("Error");
    expect(second.args[0].message).toBe("boom");
    expect(typeof second.args[0].stack).toBe("string");
  });

  it("omits args when none are given", () => {
    const logger = createAppLogger(tempDir);
    logger.warn("unknown command");

    const today = new Date().toISOString().split("T")[0];
    const line = fs.readFileSync(path.join(tempDir, "logs", `${today}.jsonl`), "utf-8").trim();
    const entry = JSON.parse(line) as Record<string, unknown>;
    expect(entry.level).toBe("warn");
    expect("args" in entry).toBe(false);
  });

  it("null logger writes nothing", () => {
    const logger = createNullLogger();
    logger.info("ignored");
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });
});
