import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger, formatLogLine, isLogLevel, silentLogger } from "./logger.js";

describe("formatLogLine", () => {
  it("renders level, scope, message and context in order", () => {
    expect(
      formatLogLine("info", "PitchScorer", "Scoring started", { event_id: "demo", session_id: "abc" }),
    ).toBe("[INFO] [PitchScorer] Scoring started event_id=demo session_id=abc");
  });

  it("quotes strings with spaces and JSON-encodes non-strings", () => {
    expect(
      formatLogLine("warn", "Tools", "Rejected", {
        team_name: "Team Rocket",
        status: 404,
        judge_id: null,
        retry: false,
      }),
    ).toBe('[WARN] [Tools] Rejected team_name="Team Rocket" status=404 judge_id=null retry=false');
  });

  it("skips undefined context values", () => {
    expect(formatLogLine("error", "Server", "Boom", { tool: undefined, code: "X" })).toBe(
      "[ERROR] [Server] Boom code=X",
    );
  });
});

describe("isLogLevel", () => {
  it("accepts the four levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops lines below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("Test", "warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown", { n: 1 });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] [Test] shown n=1");
  });

  it("routes errors to console.error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createConsoleLogger("Test").error("failed");
    expect(error).toHaveBeenCalledWith("[ERROR] [Test] failed");
  });

  it("silentLogger writes nothing", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    silentLogger.info("nothing");
    expect(log).not.toHaveBeenCalled();
  });
});
