// src/battleSystem/fixtures/Fixtures.ts
// Layout fijo del tablero y rosters de oleadas (enteros, coordenadas [x,y]).
// - El terreno estático se reconstruye en cada oleada.
// - Los items por defecto se re-colocan en cada oleada (ids con prefijo de oleada).

import type { StaticTile } from "../core/Grid";
import type { Coord } from "../core/Coord";
import type { ItemType } from "../core/CombatTypes";
import type { EnemyType } from "../constants/enemies";
import type { SpellElement } from "../constants/spells";

/* ───────────────── Tipos mínimos locales ───────────────── */

export type ItemPlacement = { x: number; y: number; type: ItemType };

export type RosterEntry = {
  type: EnemyType;
  x: number;
  y: number;
  weakness?: SpellElement;
  resistance?: SpellElement;
};

/* ───────────────── Tablero ───────────────── */

export const PLAYER_SPAWN: Coord = { x: 0, y: 0 };

export const STATIC_TERRAIN: readonly StaticTile[] = [
  // muro norte
  { x: 3, y: 3, tile: "obstacle" },
  { x: 4, y: 3, tile: "obstacle" },
  { x: 5, y: 3, tile: "obstacle" },
  // columna este
  { x: 15, y: 10, tile: "obstacle" },
  { x: 15, y: 11, tile: "obstacle" },
  { x: 15, y: 12, tile: "obstacle" },
  // estanque
  { x: 10, y: 6, tile: "water" },
  { x: 11, y: 6, tile: "water" },
  { x: 10, y: 7, tile: "water" },
  { x: 11, y: 7, tile: "water" },
  // arboleda
  { x: 6, y: 12, tile: "forest" },
  { x: 7, y: 12, tile: "forest" },
  { x: 6, y: 13, tile: "forest" },
  { x: 7, y: 13, tile: "forest" },
  { x: 2, y: 16, tile: "forest" },
];

export const DEFAULT_ITEMS: readonly ItemPlacement[] = [
  { x: 1, y: 6, type: "healthPotion" },
  { x: 12, y: 2, type: "manaPotion" },
];

/* ───────────────── Oleadas ───────────────── */

/** Oleada → roster. Una oleada sin entrada aquí significa victoria. */
export const WAVE_ROSTERS: Readonly<Record<number, readonly RosterEntry[]>> = {
  1: [
    { type: "goblin", x: 5, y: 5 },
    { type: "goblin", x: 8, y: 3 },
  ],
  2: [
    { type: "goblin", x: 6, y: 6 },
    { type: "goblin", x: 9, y: 4 },
    { type: "archer", x: 12, y: 8, weakness: "air" },
  ],
  3: [
    { type: "ogre", x: 10, y: 10, weakness: "fire", resistance: "earth" },
    { type: "goblin", x: 14, y: 5 },
    { type: "goblin", x: 5, y: 14 },
    { type: "archer", x: 16, y: 16, resistance: "fire" },
  ],
};
