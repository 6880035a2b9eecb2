import { describe, expect, it } from "vitest";

import { Roster } from "../../src/domain/entities/Roster.js";

describe("Roster", () => {
  it("ignores a second join of the same player", () => {
    const roster = new Roster();

    expect(roster.join("ann", 0)).toBe(true);
    expect(roster.join("ann", 10)).toBe(false);
    expect(roster.size).toBe(1);
  });

  it("keeps players in join order", () => {
    const roster = new Roster();
    roster.join("cy", 0);
    roster.join("ann", 1);
    roster.join("bo", 2);

    expect(roster.connectedPlayers()).toEqual(["cy", "ann", "bo"]);
  });

  it("tracks alive flags from markAllAlive to clearAlive", () => {
    const roster = new Roster();
    roster.join("ann", 0);
    roster.join("bo", 0);

    expect(roster.livingPlayers()).toEqual([]);

    roster.markAllAlive();
    expect(roster.livingPlayers()).toEqual(["ann", "bo"]);

    expect(roster.markEliminated("bo")).toBe(true);
    expect(roster.markEliminated("bo")).toBe(false);
    expect(roster.isAlive("bo")).toBe(false);
    expect([...roster.aliveMap()]).toEqual([
      ["ann", true],
      ["bo", false],
    ]);

    roster.clearAlive();
    expect(roster.livingPlayers()).toEqual([]);
  });

  it("does not eliminate unknown players", () => {
    const roster = new Roster();
    expect(roster.markEliminated("ghost")).toBe(false);
  });

  it("removes records on leave", () => {
    const roster = new Roster();
    roster.join("ann", 0);

    expect(roster.leave("ann")).toBe(true);
    expect(roster.has("ann")).toBe(false);
    expect(roster.leave("ann")).toBe(false);
  });
});
