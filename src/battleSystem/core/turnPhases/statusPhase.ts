// src/battleSystem/core/turnPhases/statusPhase.ts
import { tickStatuses } from "../StatusEngine";
import { updateEnemy } from "../../entities/Enemy";
import type { TurnContext } from "./context";
import { collectDefeated } from "./context";

/** Fase 2: un tick de estados por enemigo (daño sumado + duraciones −1). */
export function runStatusPhase(ctx: TurnContext): void {
  const { draft } = ctx;

  draft.enemies = draft.enemies.map((e) => {
    if (!e.statusEffects.length) return e;
    const tick = tickStatuses(e.statusEffects);
    draft.events.push({ type: "status_tick", enemyId: e.id, damage: tick.damage, expired: tick.expired });
    return updateEnemy(e, { health: e.health - tick.damage, statusEffects: tick.remaining });
  });

  collectDefeated(ctx);
}
