// src/battleSystem/core/turnPhases/context.ts
import type { Enemy } from "../CombatTypes";
import type { Rng } from "../RngSeed";
import type { WorkingState } from "../../snapshots/GameSnapshot";
import { isDefeated } from "../../entities/Enemy";

/** Estado compartido por las fases de un turno. Las fases mutan `draft` y acumulan `defeated`. */
export type TurnContext = {
  draft: WorkingState;
  rng: Rng;
  /** Enemigos muertos en cualquier fase del turno (orden de muerte) */
  defeated: Enemy[];
  /** El turno viene de focus/wait ⇒ regen grande */
  focused: boolean;
};

/** Saca del roster a los enemigos con vida ≤ 0 y los pasa a `defeated` (dos pasadas). */
export function collectDefeated(ctx: TurnContext): void {
  const dead = ctx.draft.enemies.filter(isDefeated);
  if (!dead.length) return;
  ctx.defeated.push(...dead);
  ctx.draft.enemies = ctx.draft.enemies.filter((e) => !isDefeated(e));
}
