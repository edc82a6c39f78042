// src/battleSystem/index.ts
/**
 * API pública del motor táctico.
 * Sin IO ni render: estado inmutable + acciones. RNG inyectable (seed) para reproducir turnos.
 */

// ───────────────────────────────────────────
// Engine / acciones
// ───────────────────────────────────────────
export { GameEngine } from "./core/GameEngine";
export type { GameEngineOptions } from "./core/GameEngine";
export { applyAction, affectedTiles, move, dash, useItem, focus, wait, castSpellAt, selectElement, selectSpellShape, restart } from "./core/PlayerActions";
export { resolveTurn } from "./core/TurnPipeline";
export { createInitialState, advanceWave } from "../services/wave.service";

// ───────────────────────────────────────────
// Tipos del estado
// ───────────────────────────────────────────
export type { GameState, GameStatus, Grid, TileType, Player, Enemy, Minion, Item, ItemType, Corpse, StatusEffect, TerrainEffect, PlayerAction, TurnEvent } from "./core/CombatTypes";
export type { Coord, Direction, ReadonlyCoordMap } from "./core/Coord";
export { coordKey, sameCoord, manhattan, CoordMap, CoordSet } from "./core/Coord";

// ───────────────────────────────────────────
// Catálogos
// ───────────────────────────────────────────
export { SPELL_ELEMENTS, SPELL_SHAPES, ELEMENT_BASE_DAMAGE, SHAPE_MANA_COST } from "./constants/spells";
export type { SpellElement, SpellShape } from "./constants/spells";
export { ENEMY_TEMPLATES } from "./constants/enemies";
export type { EnemyType } from "./constants/enemies";
export { LEVEL_UNLOCKS } from "./constants/unlocks";
export type { Unlock } from "./constants/unlocks";

// ───────────────────────────────────────────
// Utilidades puras (preview/tests)
// ───────────────────────────────────────────
export { affectedTilesFor } from "./core/SpellGeometry";
export { computeSpellDamage } from "./core/CombatResolver";
export { mulberry32, rngFromString, seededRng } from "./core/RngSeed";
export type { Rng } from "./core/RngSeed";
