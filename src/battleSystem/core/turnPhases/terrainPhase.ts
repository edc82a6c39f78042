// src/battleSystem/core/turnPhases/terrainPhase.ts
import { sameCoord } from "../Coord";
import { decayTerrainEffect, terrainTickDamage } from "../StatusEngine";
import { damagePlayer } from "../../entities/Player";
import { damageEnemy } from "../../entities/Enemy";
import type { TurnContext } from "./context";
import { collectDefeated } from "./context";

/**
 * Fase 1: cada efecto de terreno daña a quien esté encima (jugador y enemigos; los minions no),
 * luego decae. Las muertes se recolectan al final de la fase.
 */
export function runTerrainPhase(ctx: TurnContext): void {
  const { draft } = ctx;

  for (const [at, effect] of draft.terrainEffects.entries()) {
    const damage = terrainTickDamage(effect);

    if (damage > 0) {
      if (sameCoord(draft.player.position, at)) {
        draft.player = damagePlayer(draft.player, damage);
        draft.events.push({ type: "terrain_tick", at, key: effect.type, victim: "player", damage });
      }
      draft.enemies = draft.enemies.map((e) => {
        if (!sameCoord(e.position, at)) return e;
        draft.events.push({ type: "terrain_tick", at, key: effect.type, victim: e.id, damage });
        return damageEnemy(e, damage);
      });
    }

    const next = decayTerrainEffect(effect);
    if (next) draft.terrainEffects.set(at, next);
    else draft.terrainEffects.delete(at);
  }

  collectDefeated(ctx);
}
