import type { Coord, Direction, ReadonlyCoordMap } from "./Coord";
import type { SpellElement, SpellShape } from "../constants/spells";
import type { StatusKey, TerrainEffectKey } from "../constants/status";
import type { EnemyType } from "../constants/enemies";
import type { Unlock } from "../constants/unlocks";

export type TileType = "empty" | "obstacle" | "water" | "forest" | "corpse" | "item";
export type Grid = ReadonlyArray<ReadonlyArray<TileType>>;

export type GameStatus = "playing" | "victory" | "gameOver";
export type ItemType = "healthPotion" | "manaPotion";

export interface StatusEffect {
  readonly type: StatusKey;
  readonly duration: number; // turnos restantes (≥1 mientras esté activo)
}

export interface TerrainEffect {
  readonly type: TerrainEffectKey;
  readonly duration: number;
}

export interface Item {
  readonly id: string;
  readonly type: ItemType;
}

export interface Corpse {
  /** Hereda el id del enemigo derrotado */
  readonly id: string;
  readonly position: Coord;
  readonly type: EnemyType;
}

export interface Player {
  readonly position: Coord;
  readonly facing: Direction;

  readonly health: number;
  readonly maxHealth: number;
  readonly mana: number;
  readonly maxMana: number;

  readonly inventory: readonly Item[];
  readonly dashCooldown: number; // turnos

  readonly level: number;
  readonly xp: number;
  readonly xpToNextLevel: number;
  readonly spellPower: number;

  readonly unlockedElements: ReadonlySet<SpellElement>;
  readonly unlockedSpellShapes: ReadonlySet<SpellShape>;
  readonly selectedElement: SpellElement;
  readonly selectedShape: SpellShape;
}

export interface Enemy {
  readonly id: string;
  readonly type: EnemyType;
  readonly position: Coord;
  readonly health: number;
  readonly attackRange: number;
  readonly weakness?: SpellElement;
  readonly resistance?: SpellElement;
  readonly statusEffects: readonly StatusEffect[];
  readonly xpValue: number;
}

export interface Minion {
  readonly id: string;
  readonly position: Coord;
  /** Tipo original si fue levantado de un cadáver; ausente ⇒ invocación genérica */
  readonly sourceType?: EnemyType;
  readonly health: number;
}

/** Snapshot inmutable y autoritativo. Cada acción produce uno nuevo. */
export interface GameState {
  readonly gridSize: number;
  readonly grid: Grid;
  readonly player: Player;
  readonly enemies: readonly Enemy[];
  readonly minions: readonly Minion[];
  readonly itemsOnGrid: ReadonlyCoordMap<Item>;
  readonly corpsesOnGrid: ReadonlyCoordMap<Corpse>;
  readonly terrainEffects: ReadonlyCoordMap<TerrainEffect>;
  readonly status: GameStatus;
  readonly wave: number;
  /** Turnos resueltos desde el último restart */
  readonly turn: number;
  /** Contador para ids de minions/items creados en partida */
  readonly nextId: number;
  /** Eventos producidos por la acción que creó este snapshot */
  readonly events: readonly TurnEvent[];
}

export type PlayerAction =
  | { type: "move"; direction: Direction }
  | { type: "dash"; direction: Direction }
  | { type: "useItem"; itemId: string }
  | { type: "focus" }
  | { type: "wait" }
  | { type: "castSpellAt"; x: number; y: number }
  | { type: "selectElement"; element: SpellElement }
  | { type: "selectSpellShape"; shape: SpellShape }
  | { type: "restart" };

/** Quién recibe un golpe de enemigo. */
export type EnemyTargetRef = { kind: "player" } | { kind: "minion"; id: string };

export type TurnEvent =
  | { type: "move"; from: Coord; to: Coord; facing: Direction; blocked: boolean }
  | { type: "dash"; from: Coord; to: Coord; tiles: number }
  | { type: "item_picked"; item: Item; at: Coord }
  | { type: "item_used"; item: Item; restored: number }
  | { type: "spell_cast"; element: SpellElement; shape: SpellShape; target: Coord | null; manaSpent: number }
  | { type: "spell_hit"; enemyId: string; damage: number; healthAfter: number }
  | { type: "status_applied"; enemyId: string; key: StatusKey; duration: number }
  | { type: "pushback"; enemyId: string; from: Coord; to: Coord }
  | { type: "terrain_ignited"; at: Coord; duration: number }
  | { type: "self_heal"; amount: number; healthAfter: number }
  | { type: "minion_summoned"; minionId: string; at: Coord; sourceType?: EnemyType }
  | { type: "terrain_tick"; at: Coord; key: TerrainEffectKey; victim: "player" | string; damage: number }
  | { type: "status_tick"; enemyId: string; damage: number; expired: StatusKey[] }
  | { type: "minion_attack"; minionId: string; enemyId: string; damage: number }
  | { type: "minion_move"; minionId: string; from: Coord; to: Coord }
  | { type: "enemy_skip"; enemyId: string; reason: "frozen" }
  | { type: "enemy_attack"; enemyId: string; target: EnemyTargetRef; damage: number; swarmBonus: number }
  | { type: "stomp"; enemyId: string; hitPlayer: boolean; minionIds: string[]; damage: number }
  | { type: "enemy_move"; enemyId: string; from: Coord; to: Coord }
  | { type: "minion_lost"; minionId: string }
  | { type: "enemy_defeated"; enemyId: string; at: Coord; xpValue: number }
  | { type: "loot_dropped"; item: Item; at: Coord }
  | { type: "xp_gained"; amount: number }
  | { type: "level_up"; level: number }
  | { type: "unlock"; unlock: Unlock }
  | { type: "wave_started"; wave: number }
  | { type: "victory" }
  | { type: "game_over" };
