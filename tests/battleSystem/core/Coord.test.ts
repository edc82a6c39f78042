import { describe, it, expect } from "vitest";
import { CoordMap, CoordSet, coordKey, inBounds, manhattan, orthogonalNeighbors, stepCoord } from "../../../src/battleSystem/core/Coord";

describe("Coord", () => {
  it("keys coordinates structurally", () => {
    const map = new CoordMap<string>();
    map.set({ x: 2, y: 3 }, "a");
    expect(map.get({ x: 2, y: 3 })).toBe("a");
    expect(map.has({ x: 3, y: 2 })).toBe(false);
    expect(coordKey({ x: 2, y: 3 })).toBe("2,3");

    const set = new CoordSet([
      { x: 1, y: 1 },
      { x: 1, y: 1 },
    ]);
    expect(set.size).toBe(1);
  });

  it("clone does not share storage", () => {
    const map = new CoordMap<number>([[{ x: 0, y: 0 }, 1]]);
    const copy = map.clone();
    copy.set({ x: 1, y: 1 }, 2);
    expect(map.size).toBe(1);
    expect(copy.entries()).toEqual([
      [{ x: 0, y: 0 }, 1],
      [{ x: 1, y: 1 }, 2],
    ]);
  });

  it("steps, bounds and distances", () => {
    expect(stepCoord({ x: 5, y: 5 }, "up", 3)).toEqual({ x: 5, y: 2 });
    expect(inBounds({ x: 19, y: 0 }, 20)).toBe(true);
    expect(inBounds({ x: 20, y: 0 }, 20)).toBe(false);
    expect(manhattan({ x: 1, y: 1 }, { x: 4, y: -1 })).toBe(5);
    expect(orthogonalNeighbors({ x: 1, y: 1 })).toEqual([
      { x: 1, y: 0 },
      { x: 1, y: 2 },
      { x: 0, y: 1 },
      { x: 2, y: 1 },
    ]);
  });
});
