import { describe, it, expect } from "vitest";
import { InvalidParametersError } from "../src/errors.js";
import { TeamRoster } from "../src/roster.js";

const roster = new TeamRoster([
  { id: "hb", name: "Team Hoverboard", board_id: 12 },
  { id: "f", name: "Team Falcon", board_id: 7 },
]);

describe("TeamRoster", () => {
  it("lists every team in configured order", () => {
    expect(roster.all()).toEqual([
      { id: "hb", name: "Team Hoverboard", boardId: 12 },
      { id: "f", name: "Team Falcon", boardId: 7 },
    ]);
  });

  it("looks teams up by id", () => {
    expect(roster.get("f")).toEqual({ id: "f", name: "Team Falcon", boardId: 7 });
    expect(roster.get("zz")).toBeNull();
  });

  it("treats an unknown team as invalid input when required", () => {
    expect(() => roster.require("zz")).toThrow(InvalidParametersError);
    expect(() => roster.require("zz")).toThrow("Unknown team: zz");
    expect(roster.require("hb").boardId).toBe(12);
  });
});
