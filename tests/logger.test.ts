import { describe, it, expect, afterEach } from "vitest";
import { createLogger, logger, moduleLogger, setLogLevel } from "../src/logger.js";

describe("logger", () => {
  describe("createLogger", () => {
    it("creates a logger with default options", () => {
      const log = createLogger({ pretty: false });
      expect(log.level).toBe("info");
    });

    it("respects custom log level", () => {
      const log = createLogger({ level: "debug", pretty: false });
      expect(log.level).toBe("debug");
    });
  });

  describe("child logger", () => {
    it("child inherits parent log level", () => {
      const log = createLogger({ level: "warn", pretty: false });
      const child = log.child({ team: "hb", sprint: 12 });

      expect(child.level).toBe("warn");
    });
  });

  describe("log level filtering", () => {
    it("filters messages below configured level", () => {
      const log = createLogger({ level: "warn", pretty: false });

      expect(log.isLevelEnabled("info")).toBe(false);
      expect(log.isLevelEnabled("debug")).toBe(false);
      expect(log.isLevelEnabled("warn")).toBe(true);
      expect(log.isLevelEnabled("error")).toBe(true);
    });
  });

  describe("setLogLevel", () => {
    afterEach(() => {
      setLogLevel("info");
    });

    it("changes the level of the default logger", () => {
      setLogLevel("error");
      expect(logger.level).toBe("error");
      expect(logger.isLevelEnabled("warn")).toBe(false);
    });

    it("reaches module loggers created before it was called", () => {
      const log = moduleLogger("level-test");

      setLogLevel("error");
      expect(log.level).toBe("error");
      expect(log.isLevelEnabled("warn")).toBe(false);

      setLogLevel("debug");
      expect(log.level).toBe("debug");
      expect(log.isLevelEnabled("debug")).toBe(true);
    });
  });

  describe("moduleLogger", () => {
    it("returns one logger per module name", () => {
      expect(moduleLogger("same-module")).toBe(moduleLogger("same-module"));
      expect(moduleLogger("same-module")).not.toBe(moduleLogger("other-module"));
    });
  });
});
