import { describe, it, expect } from "vitest";

describe("delivery-metrics", () => {
  it("should export core modules", async () => {
    const { loadConfig } = await import("../src/config.js");
    const { createLogger } = await import("../src/logger.js");
    const { createContext, getSprintInfo } = await import("../src/api.js");
    const { SprintDataFetcher } = await import("../src/fetchers/sprint-fetcher.js");

    expect(loadConfig).toBeTypeOf("function");
    expect(createLogger).toBeTypeOf("function");
    expect(createContext).toBeTypeOf("function");
    expect(getSprintInfo).toBeTypeOf("function");
    expect(SprintDataFetcher).toBeTypeOf("function");
  });
});
