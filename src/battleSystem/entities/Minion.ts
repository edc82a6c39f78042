// src/battleSystem/entities/Minion.ts
import type { Minion } from "../core/CombatTypes";
import type { Coord } from "../core/Coord";
import type { EnemyType } from "../constants/enemies";
import { MINION_HEALTH } from "../core/CombatConfig";

export type MinionPatch = Partial<Pick<Minion, "position" | "health">>;

/** Sin `sourceType` ⇒ invocación genérica (summon); con tipo ⇒ no-muerto (raiseDead). */
export function createMinion(id: string, position: Coord, sourceType?: EnemyType): Minion {
  return { id, position, sourceType, health: MINION_HEALTH };
}

export function updateMinion(m: Minion, patch: MinionPatch): Minion {
  return {
    id: m.id,
    sourceType: m.sourceType,
    position: patch.position ?? m.position,
    health: patch.health ?? m.health,
  };
}

export function damageMinion(m: Minion, amount: number): Minion {
  return updateMinion(m, { health: m.health - amount });
}
