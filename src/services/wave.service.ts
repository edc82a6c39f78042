// src/services/wave.service.ts
/* eslint-disable no-console */
import type { Corpse, Enemy, GameState, Item, TerrainEffect } from "../battleSystem/core/CombatTypes";
import { CoordMap } from "../battleSystem/core/Coord";
import type { MutableGrid } from "../battleSystem/core/Grid";
import { buildStaticGrid, setTile } from "../battleSystem/core/Grid";
import { GRID_SIZE } from "../battleSystem/core/CombatConfig";
import { DEFAULT_ITEMS, PLAYER_SPAWN, STATIC_TERRAIN, WAVE_ROSTERS } from "../battleSystem/fixtures/Fixtures";
import type { RosterEntry } from "../battleSystem/fixtures/Fixtures";
import { createEnemy } from "../battleSystem/entities/Enemy";
import { createPlayer, movePlayer } from "../battleSystem/entities/Player";
import { TURN_DEBUG } from "../config/game";

/** Roster de la oleada o `null` si no está definida (⇒ victoria). */
export function rosterForWave(wave: number): readonly RosterEntry[] | null {
  return WAVE_ROSTERS[wave] ?? null;
}

/** Instancia el roster con ids estables `w<oleada>_<tipo>_<índice>`. */
export function spawnWave(wave: number, roster: readonly RosterEntry[]): Enemy[] {
  return roster.map((entry, i) => createEnemy(`w${wave}_${entry.type}_${i}`, entry));
}

/** Coloca los items por defecto sobre el grid (lo marca como `item`) y devuelve el overlay. */
export function placeDefaultItems(grid: MutableGrid, wave: number): CoordMap<Item> {
  const items = new CoordMap<Item>();
  DEFAULT_ITEMS.forEach((p, i) => {
    const at = { x: p.x, y: p.y };
    items.set(at, { id: `w${wave}_potion_${i}`, type: p.type });
    setTile(grid, at, "item");
  });
  return items;
}

/** Estado inicial: oleada 1, jugador nuevo en el spawn, terreno estático + items por defecto. */
export function createInitialState(): GameState {
  const roster = rosterForWave(1) ?? [];
  const grid = buildStaticGrid(GRID_SIZE, STATIC_TERRAIN);
  const itemsOnGrid = placeDefaultItems(grid, 1);

  return {
    gridSize: GRID_SIZE,
    grid,
    player: createPlayer(),
    enemies: spawnWave(1, roster),
    minions: [],
    itemsOnGrid,
    corpsesOnGrid: new CoordMap<Corpse>(),
    terrainEffects: new CoordMap<TerrainEffect>(),
    status: "playing",
    wave: 1,
    turn: 0,
    nextId: 1,
    events: [{ type: "wave_started", wave: 1 }],
  };
}

/**
 * Oleada completada: spawnea la siguiente (jugador al spawn con stats intactas, terreno estático,
 * sin cadáveres/efectos/minions, items por defecto) o declara victoria si no hay roster.
 * Los eventos se agregan a los del snapshot recibido.
 */
export function advanceWave(state: GameState): GameState {
  const wave = state.wave + 1;
  const roster = rosterForWave(wave);

  if (!roster) {
    if (TURN_DEBUG) console.log("[WAVE] sin roster para", wave, "→ victoria");
    return { ...state, status: "victory", events: [...state.events, { type: "victory" }] };
  }

  const grid = buildStaticGrid(state.gridSize, STATIC_TERRAIN);
  const itemsOnGrid = placeDefaultItems(grid, wave);
  if (TURN_DEBUG) console.log("[WAVE] inicia oleada", wave, { enemies: roster.length });

  return {
    ...state,
    grid,
    player: movePlayer(state.player, PLAYER_SPAWN),
    enemies: spawnWave(wave, roster),
    minions: [],
    itemsOnGrid,
    corpsesOnGrid: new CoordMap<Corpse>(),
    terrainEffects: new CoordMap<TerrainEffect>(),
    wave,
    events: [...state.events, { type: "wave_started", wave }],
  };
}
