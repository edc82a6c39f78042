import { describe, it, expect } from "vitest";
import { affectedTiles, castSpellAt, dash, focus, move, restart, selectElement, selectSpellShape, useItem, wait } from "../../../src/battleSystem/core/PlayerActions";
import type { Corpse, GameState, Item } from "../../../src/battleSystem/core/CombatTypes";
import type { SpellElement, SpellShape } from "../../../src/battleSystem/constants/spells";
import type { Direction } from "../../../src/battleSystem/core/Coord";
import { CoordMap, DIRECTIONS, stepCoord } from "../../../src/battleSystem/core/Coord";
import { buildStaticGrid, cloneGrid, setTile, tileAt } from "../../../src/battleSystem/core/Grid";
import { createPlayer, updatePlayer } from "../../../src/battleSystem/entities/Player";
import { createEnemy, updateEnemy } from "../../../src/battleSystem/entities/Enemy";
import { createMinion } from "../../../src/battleSystem/entities/Minion";
import { createInitialState } from "../../../src/services/wave.service";
import { blankState, scriptedRng, stateWith } from "../../helpers";

const noLoot = () => scriptedRng([]);

function withPlayer(state: GameState, patch: Parameters<typeof updatePlayer>[1]): GameState {
  return { ...state, player: updatePlayer(state.player, patch) };
}

function withLoadout(state: GameState, element: SpellElement, shape: SpellShape): GameState {
  return withPlayer(state, {
    unlockedElements: new Set<SpellElement>([...state.player.unlockedElements, element]),
    unlockedSpellShapes: new Set<SpellShape>([...state.player.unlockedSpellShapes, shape]),
    selectedElement: element,
    selectedShape: shape,
  });
}

function withCorpse(state: GameState, at: { x: number; y: number }): GameState {
  const grid = cloneGrid(state.grid);
  setTile(grid, at, "corpse");
  const corpse: Corpse = { id: "old_goblin", position: at, type: "goblin" };
  return { ...state, grid, corpsesOnGrid: new CoordMap<Corpse>([[at, corpse]]) };
}

describe("move", () => {
  it("a blocked step keeps the position, updates facing and still resolves a turn", () => {
    const start = withPlayer(createInitialState(), { position: { x: 3, y: 4 }, facing: "down" });
    const next = move(start, "up", noLoot());

    expect(next.player.position).toEqual({ x: 3, y: 4 });
    expect(next.player.facing).toBe("up");
    expect(next.turn).toBe(1);
    expect(next.events[0]).toEqual({ type: "move", from: { x: 3, y: 4 }, to: { x: 3, y: 4 }, facing: "up", blocked: true });
    // los enemigos igual actúan
    expect(next.enemies.map((e) => e.position)).toEqual([
      { x: 4, y: 5 },
      { x: 7, y: 3 },
    ]);
  });

  const blockedCases = DIRECTIONS.flatMap((d): Array<[Direction, "obstacle" | "corpse"]> => [
    [d, "obstacle"],
    [d, "corpse"],
  ]);

  it.each(blockedCases)("moving %s into a %s keeps the position, turns and resolves a turn", (direction, tile) => {
    const center = { x: 10, y: 10 };
    const grid = buildStaticGrid(20, []);
    for (const d of DIRECTIONS) setTile(grid, stepCoord(center, d), tile);
    const start = blankState([createEnemy("far", { type: "goblin", x: 19, y: 19 })], { grid, player: createPlayer({ position: center }) });

    const next = move(start, direction, noLoot());

    expect(next.player.position).toEqual(center);
    expect(next.player.facing).toBe(direction);
    expect(next.turn).toBe(1);
    expect(next.events[0]).toEqual({ type: "move", from: center, to: center, facing: direction, blocked: true });
    expect(next.enemies[0].position).toEqual({ x: 18, y: 19 });
  });

  it("corpses and the board edge also block", () => {
    const start = withCorpse(createInitialState(), { x: 1, y: 0 });
    const right = move(start, "right", noLoot());
    expect(right.player.position).toEqual({ x: 0, y: 0 });
    expect(right.player.facing).toBe("right");

    const up = move(createInitialState(), "up", noLoot());
    expect(up.player.position).toEqual({ x: 0, y: 0 });
    expect(up.turn).toBe(1);
  });

  it("picks up the item on the destination tile", () => {
    const start = withPlayer(createInitialState(), { position: { x: 1, y: 5 } });
    const next = move(start, "down", noLoot());

    expect(next.player.position).toEqual({ x: 1, y: 6 });
    expect(next.player.inventory).toEqual([{ id: "w1_potion_0", type: "healthPotion" }]);
    expect(next.itemsOnGrid.has({ x: 1, y: 6 })).toBe(false);
    expect(tileAt(next.grid, { x: 1, y: 6 })).toBe("empty");
    expect(tileAt(start.grid, { x: 1, y: 6 })).toBe("item");
  });

  it("is a no-op outside `playing`", () => {
    const over = stateWith({ status: "gameOver" });
    expect(move(over, "down", noLoot())).toBe(over);
  });
});

describe("dash", () => {
  it("leaves the state untouched without mana or while on cooldown", () => {
    const poor = withPlayer(createInitialState(), { mana: 14 });
    expect(dash(poor, "right", noLoot())).toBe(poor);

    const cooling = withPlayer(createInitialState(), { dashCooldown: 1 });
    expect(dash(cooling, "right", noLoot())).toBe(cooling);
  });

  it("travels up to 3 tiles, spends mana and sets the cooldown", () => {
    const next = dash(createInitialState(), "right", noLoot());

    expect(next.player.position).toEqual({ x: 3, y: 0 });
    expect(next.player.facing).toBe("right");
    // 100 − 15 + 2 de regen
    expect(next.player.mana).toBe(87);
    // 3, y el cierre del mismo turno lo baja a 2
    expect(next.player.dashCooldown).toBe(2);
    expect(next.events[0]).toEqual({ type: "dash", from: { x: 0, y: 0 }, to: { x: 3, y: 0 }, tiles: 3 });
  });

  it("stops before the first obstacle", () => {
    const start = withPlayer(createInitialState(), { position: { x: 0, y: 3 } });
    const next = dash(start, "right", noLoot());
    expect(next.player.position).toEqual({ x: 2, y: 3 });
    expect(next.events[0]).toEqual({ type: "dash", from: { x: 0, y: 3 }, to: { x: 2, y: 3 }, tiles: 2 });
  });

  it("picks up items along the path", () => {
    const start = withPlayer(createInitialState(), { position: { x: 1, y: 4 } });
    const next = dash(start, "down", noLoot());
    expect(next.player.position).toEqual({ x: 1, y: 7 });
    expect(next.player.inventory.map((i) => i.id)).toEqual(["w1_potion_0"]);
  });
});

describe("useItem", () => {
  const potion: Item = { id: "p1", type: "healthPotion" };
  const ether: Item = { id: "p2", type: "manaPotion" };

  it("heals by 30 and consumes the item and a turn", () => {
    const start = withPlayer(createInitialState(), { health: 50, inventory: [potion, ether] });
    const next = useItem(start, "p1", noLoot());

    expect(next.player.health).toBe(80);
    expect(next.player.inventory).toEqual([ether]);
    expect(next.events[0]).toEqual({ type: "item_used", item: potion, restored: 30 });
    expect(next.turn).toBe(1);
  });

  it("clamps mana to the maximum", () => {
    const start = withPlayer(createInitialState(), { mana: 90, inventory: [ether] });
    const next = useItem(start, "p2", noLoot());
    expect(next.events[0]).toEqual({ type: "item_used", item: ether, restored: 10 });
    expect(next.player.mana).toBe(100);
  });

  it("is a no-op for an item not in the inventory", () => {
    const start = createInitialState();
    expect(useItem(start, "ghost", noLoot())).toBe(start);
  });
});

describe("focus / wait", () => {
  it("both regenerate 10 mana", () => {
    const start = withPlayer(createInitialState(), { mana: 50 });
    expect(focus(start, noLoot()).player.mana).toBe(60);
    expect(wait(start, noLoot()).player.mana).toBe(60);
  });

  it("a regular turn regenerates 2 and never exceeds the maximum", () => {
    const start = withPlayer(createInitialState(), { mana: 99 });
    expect(move(start, "right", noLoot()).player.mana).toBe(100);
  });
});

describe("castSpellAt", () => {
  it("fire ball on a goblin: 50 − round(30 + spellPower), burn applied, then ticked", () => {
    const start = createInitialState();
    const next = castSpellAt(start, 5, 5, noLoot());

    expect(next.events.slice(0, 3)).toEqual([
      { type: "spell_cast", element: "fire", shape: "ball", target: { x: 5, y: 5 }, manaSpent: 10 },
      { type: "spell_hit", enemyId: "w1_goblin_0", damage: 30, healthAfter: 20 },
      { type: "status_applied", enemyId: "w1_goblin_0", key: "burn", duration: 3 },
    ]);
    // burn hace 5 en la fase de estados del mismo turno
    expect(next.enemies[0]).toMatchObject({ id: "w1_goblin_0", health: 15, position: { x: 4, y: 5 }, statusEffects: [{ type: "burn", duration: 2 }] });
    expect(next.player.mana).toBe(92);
    // el snapshot de entrada no cambia
    expect(start.enemies[0].health).toBe(50);
    expect(start.player.mana).toBe(100);
  });

  it("a fire-weak enemy takes round((30 + spellPower) × 1.5)", () => {
    const ogre = createEnemy("ogre", { type: "ogre", x: 10, y: 10, weakness: "fire" });
    const start = withPlayer(stateWith({ enemies: [ogre] }), { spellPower: 4 });
    const next = castSpellAt(start, 10, 10, noLoot());

    expect(next.events[1]).toEqual({ type: "spell_hit", enemyId: "ogre", damage: 51, healthAfter: 49 });
    expect(next.events[2]).toEqual({ type: "status_applied", enemyId: "ogre", key: "burn", duration: 3 });
    expect(next.enemies[0].health).toBe(44);
  });

  it("a kill leaves a corpse, grants XP and may drop loot next to it", () => {
    const start = stateWith({ enemies: [updateEnemy(createInitialState().enemies[0], { health: 20 }), createInitialState().enemies[1]] });
    // chance ✓ · vida · shuffle sin intercambios ⇒ casilla de arriba
    const next = castSpellAt(start, 5, 5, scriptedRng([0.1, 0.2, 0.99, 0.99, 0.99]));

    expect(next.enemies.map((e) => e.id)).toEqual(["w1_goblin_1"]);
    expect(tileAt(next.grid, { x: 5, y: 5 })).toBe("corpse");
    expect(next.corpsesOnGrid.get({ x: 5, y: 5 })).toEqual({ id: "w1_goblin_0", position: { x: 5, y: 5 }, type: "goblin" });
    expect(next.itemsOnGrid.get({ x: 5, y: 4 })).toEqual({ id: "item_1", type: "healthPotion" });
    expect(tileAt(next.grid, { x: 5, y: 4 })).toBe("item");
    expect(next.nextId).toBe(2);
    expect(next.player.xp).toBe(25);
    expect(next.events.filter((e) => e.type === "xp_gained")).toEqual([{ type: "xp_gained", amount: 25 }]);
  });

  it("loot never lands on the player's tile", () => {
    const initial = createInitialState();
    const start = stateWith({
      player: updatePlayer(initial.player, { position: { x: 5, y: 4 } }),
      enemies: [updateEnemy(initial.enemies[0], { health: 20 }), initial.enemies[1]],
    });
    // misma tirada que arriba, pero (5,4) está ocupada ⇒ primera candidata (5,6)
    const next = castSpellAt(start, 5, 5, scriptedRng([0.1, 0.2, 0.99, 0.99]));

    expect(next.itemsOnGrid.has({ x: 5, y: 4 })).toBe(false);
    expect(next.itemsOnGrid.get({ x: 5, y: 6 })).toEqual({ id: "item_1", type: "healthPotion" });
  });

  it("does nothing without mana or outside the board", () => {
    const poor = withPlayer(createInitialState(), { mana: 9 });
    expect(castSpellAt(poor, 5, 5, noLoot())).toBe(poor);

    const start = createInitialState();
    expect(castSpellAt(start, -1, 5, noLoot())).toBe(start);
    expect(castSpellAt(start, 5, 20, noLoot())).toBe(start);
  });

  it("an AOE that hits nothing still costs mana and a turn", () => {
    const next = castSpellAt(createInitialState(), 15, 15, noLoot());
    expect(next.turn).toBe(1);
    expect(next.player.mana).toBe(92);
  });

  it("self heals 20 without a target tile", () => {
    const start = withPlayer(withLoadout(createInitialState(), "fire", "self"), { health: 70 });
    const next = castSpellAt(start, 99, 99, noLoot());

    expect(next.events.slice(0, 2)).toEqual([
      { type: "spell_cast", element: "fire", shape: "self", target: null, manaSpent: 15 },
      { type: "self_heal", amount: 20, healthAfter: 90 },
    ]);
    expect(next.player.health).toBe(90);
    expect(next.player.mana).toBe(87);
  });

  it("summon needs an empty, unoccupied tile", () => {
    const start = withLoadout(createInitialState(), "fire", "summon");
    expect(castSpellAt(start, 5, 5, noLoot())).toBe(start);
    expect(castSpellAt(start, 3, 3, noLoot())).toBe(start);
    expect(castSpellAt(start, 1, 6, noLoot())).toBe(start);
    expect(castSpellAt(start, 0, 0, noLoot())).toBe(start);

    const next = castSpellAt(start, 2, 2, noLoot());
    // el minion avanza hacia el goblin más cercano en su propia fase
    expect(next.minions).toEqual([{ id: "minion_1", position: { x: 3, y: 2 }, sourceType: undefined, health: 40 }]);
    expect(next.player.mana).toBe(72);
    expect(next.nextId).toBe(2);
  });

  it("raiseDead without a corpse is a no-op", () => {
    const start = withLoadout(createInitialState(), "fire", "raiseDead");
    expect(castSpellAt(start, 2, 2, noLoot())).toBe(start);
  });

  it("raiseDead consumes the corpse and raises a minion of its type", () => {
    const start = withCorpse(withLoadout(createInitialState(), "fire", "raiseDead"), { x: 2, y: 2 });
    const next = castSpellAt(start, 2, 2, noLoot());

    expect(next.corpsesOnGrid.size).toBe(0);
    expect(tileAt(next.grid, { x: 2, y: 2 })).toBe("empty");
    expect(next.minions).toEqual([{ id: "minion_1", position: { x: 3, y: 2 }, sourceType: "goblin", health: 40 }]);
    expect(next.events[1]).toEqual({ type: "minion_summoned", minionId: "minion_1", at: { x: 2, y: 2 }, sourceType: "goblin" });
    expect(next.player.mana).toBe(67);
  });

  it("raiseDead is a no-op when someone stands on the corpse", () => {
    const base = withLoadout(createInitialState(), "fire", "raiseDead");
    // el goblin de (5,5) pisa el cadáver de (5,4) mientras avanza hacia el jugador
    const start = withCorpse(withPlayer(base, { position: { x: 5, y: 1 } }), { x: 5, y: 4 });
    const after = focus(start, noLoot());
    expect(after.enemies[0].position).toEqual({ x: 5, y: 4 });
    expect(castSpellAt(after, 5, 4, noLoot())).toBe(after);

    const underMinion = { ...withCorpse(base, { x: 2, y: 2 }), minions: [createMinion("m1", { x: 2, y: 2 })] };
    expect(castSpellAt(underMinion, 2, 2, noLoot())).toBe(underMinion);
  });

  it("raiseDead restores the terrain under the corpse", () => {
    const start = withCorpse(withLoadout(createInitialState(), "fire", "raiseDead"), { x: 10, y: 6 });
    expect(tileAt(start.grid, { x: 10, y: 6 })).toBe("corpse");

    const next = castSpellAt(start, 10, 6, noLoot());
    expect(next.corpsesOnGrid.size).toBe(0);
    expect(tileAt(next.grid, { x: 10, y: 6 })).toBe("water");
  });

  it("a fire wall ignites every affected tile", () => {
    const start = withLoadout(createInitialState(), "fire", "wall");
    const next = castSpellAt(start, 10, 15, noLoot());

    expect(next.terrainEffects.size).toBe(9);
    // encendido con 3 turnos, ya pasó la fase de terreno de este turno
    expect(next.terrainEffects.get({ x: 9, y: 14 })).toEqual({ type: "burning", duration: 2 });
    expect(next.events.filter((e) => e.type === "terrain_ignited")).toHaveLength(9);
  });
});

describe("loadout", () => {
  it("locked elements and shapes are rejected", () => {
    const start = createInitialState();
    expect(selectElement(start, "water")).toBe(start);
    expect(selectSpellShape(start, "cone")).toBe(start);
  });

  it("unlocked values change the loadout without spending a turn", () => {
    const start = withPlayer(createInitialState(), { unlockedElements: new Set<SpellElement>(["fire", "water"]) });
    const next = selectElement(start, "water");
    expect(next.player.selectedElement).toBe("water");
    expect(next.turn).toBe(0);
    expect(next.enemies).toBe(start.enemies);
  });

  it("affectedTiles previews with the current loadout", () => {
    const start = withLoadout(withPlayer(createInitialState(), { position: { x: 5, y: 5 }, facing: "down" }), "fire", "cone");
    expect(affectedTiles(start, { x: 5, y: 5 }).values()).toEqual([
      { x: 5, y: 6 },
      { x: 4, y: 7 },
      { x: 5, y: 7 },
      { x: 6, y: 7 },
    ]);
    expect(affectedTiles(start).size).toBe(0);
  });
});

describe("restart", () => {
  it("re-initializes from a terminal state", () => {
    const next = restart();
    expect(next).toMatchObject({ status: "playing", wave: 1, turn: 0 });
    expect(next.enemies).toHaveLength(2);
  });
});
