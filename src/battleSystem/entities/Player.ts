// src/battleSystem/entities/Player.ts
import type { Player } from "../core/CombatTypes";
import type { Coord } from "../core/Coord";
import type { SpellElement, SpellShape } from "../constants/spells";
import { clamp } from "../core/CombatMath";
import { XP_BASE } from "../core/CombatConfig";
import { PLAYER_SPAWN } from "../fixtures/Fixtures";

/** Campos que una actualización puede tocar (todo el jugador es variable). */
export type PlayerPatch = Partial<Player>;

/**
 * Jugador inicial: 100/100 de vida y maná, nivel 1, solo fire/ball desbloqueados.
 * `overrides` existe para tests y para el CLI.
 */
export function createPlayer(overrides: PlayerPatch = {}): Player {
  return {
    position: PLAYER_SPAWN,
    facing: "up",
    health: 100,
    maxHealth: 100,
    mana: 100,
    maxMana: 100,
    inventory: [],
    dashCooldown: 0,
    level: 1,
    xp: 0,
    xpToNextLevel: XP_BASE,
    spellPower: 0,
    unlockedElements: new Set<SpellElement>(["fire"]),
    unlockedSpellShapes: new Set<SpellShape>(["ball"]),
    selectedElement: "fire",
    selectedShape: "ball",
    ...overrides,
  };
}

export function updatePlayer(p: Player, patch: PlayerPatch): Player {
  return { ...p, ...patch };
}

export function movePlayer(p: Player, position: Coord): Player {
  return updatePlayer(p, { position });
}

/** Cura con clamp a maxHealth; devuelve el jugador y lo realmente curado. */
export function healPlayer(p: Player, amount: number): { player: Player; restored: number } {
  const health = Math.max(p.health, clamp(p.health + amount, 0, p.maxHealth));
  return { player: updatePlayer(p, { health }), restored: health - p.health };
}

export function restoreMana(p: Player, amount: number): { player: Player; restored: number } {
  const mana = Math.max(p.mana, clamp(p.mana + amount, 0, p.maxMana));
  return { player: updatePlayer(p, { mana }), restored: mana - p.mana };
}

export function spendMana(p: Player, cost: number): Player {
  return updatePlayer(p, { mana: p.mana - cost });
}

/** La vida NO se clampa a 0: el game over se evalúa al cierre del turno. */
export function damagePlayer(p: Player, amount: number): Player {
  return updatePlayer(p, { health: p.health - amount });
}
