import { describe, it, expect } from "vitest";
import { shouldUseCachedSprint } from "../../src/sprints/cache-policy.js";
import { DAY, makeRecord, makeSprintInfo } from "../fixtures/tracker.js";

const NOW = new Date("2024-06-20T12:00:00Z");

function closedDaysAgo(days: number) {
  return makeRecord({
    sprint: makeSprintInfo({ state: "closed", completeDate: new Date(NOW.getTime() - days * DAY) }),
  });
}

describe("shouldUseCachedSprint", () => {
  it("uses a sprint that closed before the grace window", () => {
    expect(shouldUseCachedSprint(closedDaysAgo(7), { now: NOW })).toBe(true);
  });

  it("refetches a sprint that closed within the grace window", () => {
    expect(shouldUseCachedSprint(closedDaysAgo(2), { now: NOW })).toBe(false);
    expect(shouldUseCachedSprint(closedDaysAgo(6), { now: NOW })).toBe(false);
  });

  it("never uses an active or future sprint", () => {
    const old = new Date("2020-01-01T00:00:00Z");
    const active = makeRecord({ sprint: makeSprintInfo({ state: "active", completeDate: old }) });
    const future = makeRecord({ sprint: makeSprintInfo({ state: "future", completeDate: old }) });
    expect(shouldUseCachedSprint(active, { now: NOW })).toBe(false);
    expect(shouldUseCachedSprint(future, { now: NOW })).toBe(false);
  });

  it("refetches a closed sprint without a complete date", () => {
    const record = makeRecord({ sprint: makeSprintInfo({ state: "closed", completeDate: null }) });
    expect(shouldUseCachedSprint(record, { now: NOW })).toBe(false);
  });

  it("returns false when nothing is cached", () => {
    expect(shouldUseCachedSprint(null, { now: NOW })).toBe(false);
  });

  it("honours a custom grace window", () => {
    expect(shouldUseCachedSprint(closedDaysAgo(2), { now: NOW, closedGraceDays: 1 })).toBe(true);
    expect(shouldUseCachedSprint(closedDaysAgo(7), { now: NOW, closedGraceDays: 10 })).toBe(false);
  });
});
