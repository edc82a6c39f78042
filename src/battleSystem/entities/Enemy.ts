// src/battleSystem/entities/Enemy.ts
import type { Enemy, StatusEffect } from "../core/CombatTypes";
import type { Coord } from "../core/Coord";
import { ENEMY_TEMPLATES } from "../constants/enemies";
import type { RosterEntry } from "../fixtures/Fixtures";

/**
 * Solo posición, vida y estados cambian durante la partida.
 * id, tipo, alcance, debilidad/resistencia y XP quedan fijos desde el spawn.
 */
export type EnemyPatch = Partial<Pick<Enemy, "position" | "health" | "statusEffects">>;

/** Instancia un enemigo desde una entrada de roster + plantilla del tipo. */
export function createEnemy(id: string, entry: RosterEntry): Enemy {
  const tpl = ENEMY_TEMPLATES[entry.type];
  return {
    id,
    type: entry.type,
    position: { x: entry.x, y: entry.y },
    health: tpl.health,
    attackRange: tpl.attackRange,
    weakness: entry.weakness,
    resistance: entry.resistance,
    statusEffects: [],
    xpValue: tpl.xpValue,
  };
}

export function updateEnemy(e: Enemy, patch: EnemyPatch): Enemy {
  return {
    ...e,
    position: patch.position ?? e.position,
    health: patch.health ?? e.health,
    statusEffects: patch.statusEffects ?? e.statusEffects,
  };
}

export function damageEnemy(e: Enemy, amount: number): Enemy {
  return updateEnemy(e, { health: e.health - amount });
}

export function moveEnemy(e: Enemy, position: Coord): Enemy {
  return updateEnemy(e, { position });
}

export function withStatuses(e: Enemy, statusEffects: readonly StatusEffect[]): Enemy {
  return updateEnemy(e, { statusEffects });
}

export const isDefeated = (e: { health: number }) => e.health <= 0;
