// tests/helpers.ts
import type { Rng } from "../src/battleSystem/core/RngSeed";
import type { Corpse, Enemy, GameState, Item, TerrainEffect } from "../src/battleSystem/core/CombatTypes";
import { buildStaticGrid } from "../src/battleSystem/core/Grid";
import { CoordMap } from "../src/battleSystem/core/Coord";
import { createPlayer } from "../src/battleSystem/entities/Player";
import { createInitialState } from "../src/services/wave.service";

/** RNG con valores fijos; al agotarse devuelve `fallback` (0.99 ⇒ nunca cae loot). */
export function scriptedRng(values: readonly number[], fallback = 0.99): Rng {
  let i = 0;
  return () => (i < values.length ? values[i++] : fallback);
}

/** Estado de oleada 1 con overrides superficiales. */
export function stateWith(patch: Partial<GameState>): GameState {
  return { ...createInitialState(), ...patch };
}

/** Tablero vacío sin items ni terreno, con los enemigos dados. */
export function blankState(enemies: readonly Enemy[], patch: Partial<GameState> = {}): GameState {
  return {
    gridSize: 20,
    grid: buildStaticGrid(20, []),
    player: createPlayer(),
    enemies,
    minions: [],
    itemsOnGrid: new CoordMap<Item>(),
    corpsesOnGrid: new CoordMap<Corpse>(),
    terrainEffects: new CoordMap<TerrainEffect>(),
    status: "playing",
    wave: 1,
    turn: 0,
    nextId: 1,
    events: [],
    ...patch,
  };
}
