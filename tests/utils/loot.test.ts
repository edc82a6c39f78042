import { describe, it, expect } from "vitest";
import { lootCandidates, rollLootForEnemy } from "../../src/utils/loot";
import { CoordMap, CoordSet } from "../../src/battleSystem/core/Coord";
import type { Item } from "../../src/battleSystem/core/CombatTypes";
import { buildStaticGrid } from "../../src/battleSystem/core/Grid";
import { scriptedRng } from "../helpers";

const openGrid = buildStaticGrid(20, []);
const noItems = new CoordMap<Item>();
const nobody = new CoordSet();

describe("rollLootForEnemy", () => {
  it("drops nothing when the 25% roll fails", () => {
    expect(rollLootForEnemy(scriptedRng([0.25]), { x: 5, y: 5 }, openGrid, noItems, nobody)).toBeNull();
  });

  it("picks the potion type and a shuffled neighbour", () => {
    // chance 0.1 ✓ · tipo 0.7 ⇒ maná · shuffle sin intercambios ⇒ primer vecino (arriba)
    const drop = rollLootForEnemy(scriptedRng([0.1, 0.7, 0.99, 0.99, 0.99]), { x: 5, y: 5 }, openGrid, noItems, nobody);
    expect(drop).toEqual({ type: "manaPotion", at: { x: 5, y: 4 } });
  });

  it("only uses empty, item-free, in-bounds neighbours", () => {
    const grid = buildStaticGrid(20, [
      { x: 5, y: 4, tile: "obstacle" },
      { x: 4, y: 5, tile: "water" },
    ]);
    const items = new CoordMap<Item>([[{ x: 5, y: 6 }, { id: "p", type: "healthPotion" }]]);

    expect(lootCandidates({ x: 5, y: 5 }, grid, items, nobody)).toEqual([{ x: 6, y: 5 }]);
    expect(rollLootForEnemy(scriptedRng([0.1, 0.2]), { x: 5, y: 5 }, grid, items, nobody)).toEqual({ type: "healthPotion", at: { x: 6, y: 5 } });
  });

  it("never drops under someone standing next to the body", () => {
    const occupied = new CoordSet([
      { x: 5, y: 4 },
      { x: 6, y: 5 },
    ]);
    expect(lootCandidates({ x: 5, y: 5 }, openGrid, noItems, occupied)).toEqual([
      { x: 5, y: 6 },
      { x: 4, y: 5 },
    ]);
  });

  it("skips the drop when no neighbour qualifies", () => {
    const grid = buildStaticGrid(20, [
      { x: 1, y: 0, tile: "obstacle" },
      { x: 0, y: 1, tile: "forest" },
    ]);
    expect(rollLootForEnemy(scriptedRng([0.1, 0.2]), { x: 0, y: 0 }, grid, noItems, nobody)).toBeNull();
  });
});
