// src/utils/loot.ts
import type { Grid, ItemType } from "../battleSystem/core/CombatTypes";
import type { Coord, CoordSet, ReadonlyCoordMap } from "../battleSystem/core/Coord";
import { orthogonalNeighbors } from "../battleSystem/core/Coord";
import { tileAt } from "../battleSystem/core/Grid";
import type { Rng } from "../battleSystem/core/RngSeed";
import { chance, shuffle } from "../battleSystem/core/RngSeed";
import { LOOT_DROP_CHANCE_PERCENT } from "../battleSystem/core/CombatConfig";

/** Drop resuelto: qué poción y dónde cae. */
export type PotionDrop = { type: ItemType; at: Coord };

/** Vecinos ortogonales donde puede caer loot: dentro del tablero, `empty`, sin item y sin nadie encima. */
export function lootCandidates(origin: Coord, grid: Grid, itemsOnGrid: ReadonlyCoordMap<unknown>, occupied: CoordSet): Coord[] {
  return orthogonalNeighbors(origin).filter((c) => tileAt(grid, c) === "empty" && !itemsOnGrid.has(c) && !occupied.has(c));
}

/**
 * Tirada de loot por enemigo derrotado:
 * - `LOOT_DROP_CHANCE_PERCENT`% de que caiga algo.
 * - Tipo 50/50 (vida o maná).
 * - Casilla al azar entre las candidatas; sin candidatas ⇒ no hay drop.
 * Orden de consumo del RNG: chance → tipo → shuffle.
 */
export function rollLootForEnemy(rng: Rng, origin: Coord, grid: Grid, itemsOnGrid: ReadonlyCoordMap<unknown>, occupied: CoordSet): PotionDrop | null {
  if (!chance(rng, LOOT_DROP_CHANCE_PERCENT)) return null;

  const type: ItemType = rng() < 0.5 ? "healthPotion" : "manaPotion";

  const candidates = lootCandidates(origin, grid, itemsOnGrid, occupied);
  if (!candidates.length) return null;

  const [at] = shuffle(rng, candidates);
  return { type, at };
}
