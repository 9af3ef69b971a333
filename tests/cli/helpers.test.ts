import { describe, it, expect, vi, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { InvalidArgumentError } from "commander";
import {
  createContextFromOpts,
  exitCodeFor,
  failCommand,
  loadConfigFromOpts,
  parseLimit,
  parseSprintOption,
  printJson,
} from "../../src/cli/helpers.js";
import { InvalidParametersError, SourceUnavailableError } from "../../src/errors.js";
import { logger, setLogLevel } from "../../src/logger.js";

const tmpDirs: string[] = [];

function writeTmpConfig(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-helpers-"));
  tmpDirs.push(dir);
  const file = path.join(dir, "delivery-metrics.config.yaml");
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

const CONFIG_YAML = `
tracker:
  base_url: https://tracker.example.test
  token: test-secret
teams:
  - id: hb
    name: Team Hoverboard
    board_id: 12
log:
  level: warn
`;

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel("info");
  for (const dir of tmpDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("parseSprintOption", () => {
  it("parses sprint references", () => {
    expect(parseSprintOption("current")).toEqual({ kind: "current" });
    expect(parseSprintOption("before-last")).toEqual({ kind: "before-last-completed" });
    expect(parseSprintOption("812")).toEqual({ kind: "id", id: 812 });
  });

  it("throws InvalidArgumentError for anything else", () => {
    expect(() => parseSprintOption("next")).toThrow(InvalidArgumentError);
    expect(() => parseSprintOption("0")).toThrow(
      'Sprint must be "current", "last", "before-last" or a positive sprint id.',
    );
  });
});

describe("parseLimit", () => {
  it("parses a positive integer", () => {
    expect(parseLimit("5")).toBe(5);
  });

  it("rejects zero, negatives and non-numbers", () => {
    expect(() => parseLimit("0")).toThrow(InvalidArgumentError);
    expect(() => parseLimit("-2")).toThrow("Limit must be a positive integer.");
    expect(() => parseLimit("many")).toThrow(InvalidArgumentError);
  });
});

describe("loadConfigFromOpts", () => {
  it("loads the config and applies its log level", () => {
    const config = loadConfigFromOpts(writeTmpConfig(CONFIG_YAML));
    expect(config.teams).toEqual([{ id: "hb", name: "Team Hoverboard", board_id: 12 }]);
    expect(logger.level).toBe("warn");
  });

  it("builds a context with the configured teams", () => {
    const ctx = createContextFromOpts(writeTmpConfig(CONFIG_YAML));
    expect(ctx.roster.all()).toEqual([{ id: "hb", name: "Team Hoverboard", boardId: 12 }]);
  });
});

describe("printJson", () => {
  it("prints indented JSON on stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    printJson({ teamId: "hb", sprintId: null });
    expect(log).toHaveBeenCalledWith('{\n  "teamId": "hb",\n  "sprintId": null\n}');
  });
});

describe("exitCodeFor / failCommand", () => {
  it("exits with 2 for invalid input and 1 otherwise", () => {
    expect(exitCodeFor(new InvalidParametersError("bad"))).toBe(2);
    expect(exitCodeFor(new SourceUnavailableError("down"))).toBe(1);
    expect(exitCodeFor("boom")).toBe(1);
  });

  it("reports the failure and exits", () => {
    const exit = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(logger, "error").mockImplementation(() => undefined);

    expect(() => failCommand("Sprint fetch", new InvalidParametersError("Unknown team: zz"))).toThrow(
      "process.exit",
    );
    expect(stderr).toHaveBeenCalledWith("❌ Sprint fetch failed:", "Unknown team: zz");
    expect(exit).toHaveBeenCalledWith(2);
  });
});
