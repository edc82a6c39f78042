// src/battleSystem/core/turnPhases/minionPhase.ts
import { MINION_ATTACK_DAMAGE } from "../CombatConfig";
import { CoordSet, sameCoord } from "../Coord";
import { advanceWithOccupancy, nearestEnemy } from "../CombatAI";
import { damageEnemy, isDefeated } from "../../entities/Enemy";
import { updateMinion } from "../../entities/Minion";
import type { TurnContext } from "./context";

/**
 * Fase 3: cada minion (en orden) pega al enemigo más cercano si está adyacente,
 * si no da un paso hacia él. Se salta entera si no quedan enemigos.
 * La casilla de un enemigo muerto aquí sigue reclamada: ahí cae su cadáver.
 */
export function runMinionPhase(ctx: TurnContext): void {
  const { draft } = ctx;
  if (!draft.enemies.length || !draft.minions.length) return;

  const occupied = new CoordSet([draft.player.position, ...draft.enemies.map((e) => e.position), ...draft.minions.map((m) => m.position)]);

  draft.minions = draft.minions.map((minion) => {
    const nearest = nearestEnemy(minion.position, draft.enemies);
    if (!nearest) return minion;
    const { enemy, distance } = nearest;

    if (distance === 1) {
      const hit = damageEnemy(enemy, MINION_ATTACK_DAMAGE);
      draft.events.push({ type: "minion_attack", minionId: minion.id, enemyId: enemy.id, damage: MINION_ATTACK_DAMAGE });
      if (isDefeated(hit)) {
        ctx.defeated.push(hit);
        draft.enemies = draft.enemies.filter((e) => e.id !== enemy.id);
      } else {
        draft.enemies = draft.enemies.map((e) => (e.id === enemy.id ? hit : e));
      }
      return minion;
    }

    const to = advanceWithOccupancy(minion.position, enemy.position, draft.grid, occupied);
    if (sameCoord(to, minion.position)) return minion;
    draft.events.push({ type: "minion_move", minionId: minion.id, from: minion.position, to });
    return updateMinion(minion, { position: to });
  });
}
