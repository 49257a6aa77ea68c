import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { Logger, createLogger } from "./logger.js";

describe("Logger", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "stepline-logger-test-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes to console.log for info level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({ tool: "synth", step: "elaborate" }, { fileOutput: false });
    logger.info("test message");
    expect(spy).toHaveBeenCalledWith("[synth] test message");
  });

  it("writes to console.error for error level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger({ tool: "par", step: "route" }, { fileOutput: false });
    logger.error("something broke");
    expect(spy).toHaveBeenCalledWith("[par] something broke");
  });

  it("writes to console.warn for warn level", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger({ tool: "drc", step: "" }, { fileOutput: false });
    logger.warn("careful");
    expect(spy).toHaveBeenCalledWith("[drc] careful");
  });

  it("uses [stepline] prefix when tool is empty", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({ tool: "", step: "" }, { fileOutput: false });
    logger.info("no tool");
    expect(spy).toHaveBeenCalledWith("[stepline] no tool");
  });

  it("respects minimum log level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({ tool: "synth", step: "" }, { level: "warn", fileOutput: false });
    logger.info("should be suppressed");
    logger.debug("also suppressed");
    expect(spy).not.toHaveBeenCalled();
  });

  it("emits debug lines when the level allows it", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({ tool: "synth", step: "" }, { level: "debug", fileOutput: false });
    logger.debug("Running sub-step 'elaborate'");
    logger.trace("hidden");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("[synth] Running sub-step 'elaborate'");
  });

  it("writes JSON lines to log file", () => {
    const logger = new Logger(
      { tool: "synth", step: "elaborate" },
      { logDir: tmpDir, consoleOutput: false },
    );
    logger.info("file test");

    const files = fs.readdirSync(tmpDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^stepline-\d{4}-\d{2}-\d{2}\.jsonl$/);

    const content = fs.readFileSync(path.join(tmpDir, files[0]!), "utf-8");
    const entry = JSON.parse(content.trim());
    expect(entry.level).toBe("info");
    expect(entry.tool).toBe("synth");
    expect(entry.step).toBe("elaborate");
    expect(entry.msg).toBe("file test");
    expect(entry.ts).toBeDefined();
  });

  it("redacts secrets in the log file but not on the console", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({ tool: "synth", step: "" }, { logDir: tmpDir });
    logger.info("Running LM_LICENSE_TOKEN=test-secret genus");

    expect(spy).toHaveBeenCalledWith("[synth] Running LM_LICENSE_TOKEN=test-secret genus");
    const [file] = fs.readdirSync(tmpDir);
    const entry = JSON.parse(fs.readFileSync(path.join(tmpDir, file!), "utf-8").trim());
    expect(entry.msg).toBe("Running LM_LICENSE_TOKEN=[REDACTED] genus");
  });

  it("appends multiple entries to the same log file", () => {
    const logger = new Logger(
      { tool: "synth", step: "" },
      { logDir: tmpDir, consoleOutput: false },
    );
    logger.info("first");
    logger.info("second");
    logger.warn("third");

    const files = fs.readdirSync(tmpDir);
    expect(files).toHaveLength(1);

    const lines = fs.readFileSync(path.join(tmpDir, files[0]!), "utf-8").trim().split("\n");
    expect(lines).toHaveLength(3);
  });

  it("falls back to console when the log directory cannot be created", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const blocker = path.join(tmpDir, "not-a-dir");
    fs.writeFileSync(blocker, "");
    const logger = new Logger(
      { tool: "synth", step: "" },
      { logDir: path.join(blocker, "logs"), consoleOutput: false },
    );
    logger.info("first");
    logger.info("second");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]![0])).toMatch(/^\[stepline\] File logging disabled: /);
  });

  it("child() creates a logger with overridden context", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const parent = new Logger({ tool: "synth", step: "" }, { fileOutput: false });
    const child = parent.child({ tool: "par", step: "route" });
    child.info("child message");
    expect(spy).toHaveBeenCalledWith("[par] child message");
  });

  it("fatal() writes to console.error", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger({ tool: "synth", step: "" }, { fileOutput: false });
    logger.fatal("crash");
    expect(spy).toHaveBeenCalledWith("[synth] crash");
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates a logger with defaults", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({}, { fileOutput: false });
    logger.info("default logger");
    expect(spy).toHaveBeenCalledWith("[stepline] default logger");
  });

  it("creates a logger with partial context", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger({ tool: "lvs" }, { fileOutput: false });
    logger.info("partial context");
    expect(spy).toHaveBeenCalledWith("[lvs] partial context");
  });
});
