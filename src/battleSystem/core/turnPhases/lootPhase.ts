// src/battleSystem/core/turnPhases/lootPhase.ts
/* eslint-disable no-console */
import { CoordSet } from "../Coord";
import { setTile } from "../Grid";
import { takeId } from "../../snapshots/GameSnapshot";
import { rollLootForEnemy } from "../../../utils/loot";
import { applyExperience } from "../../../services/progression.service";
import { TURN_DEBUG } from "../../../config/game";
import type { TurnContext } from "./context";

/**
 * Fase 5: todos los muertos del turno juntos.
 * Cadáver en la casilla de muerte (pisa cualquier item o cadáver previo), tirada de loot, y la XP sumada al final.
 * El loot no cae bajo el jugador, un enemigo o minion vivo, ni donde va a quedar otro cadáver de este turno.
 */
export function runLootPhase(ctx: TurnContext): void {
  const { draft, rng } = ctx;
  if (!ctx.defeated.length) return;

  const occupied = new CoordSet([
    draft.player.position,
    ...draft.enemies.map((e) => e.position),
    ...draft.minions.map((m) => m.position),
    ...ctx.defeated.map((e) => e.position),
  ]);

  let xp = 0;
  for (const enemy of ctx.defeated) {
    const at = enemy.position;
    draft.events.push({ type: "enemy_defeated", enemyId: enemy.id, at, xpValue: enemy.xpValue });

    draft.itemsOnGrid.delete(at);
    draft.corpsesOnGrid.set(at, { id: enemy.id, position: at, type: enemy.type });
    setTile(draft.grid, at, "corpse");

    const drop = rollLootForEnemy(rng, at, draft.grid, draft.itemsOnGrid, occupied);
    if (drop) {
      const item = { id: takeId(draft, "item"), type: drop.type };
      draft.itemsOnGrid.set(drop.at, item);
      setTile(draft.grid, drop.at, "item");
      draft.events.push({ type: "loot_dropped", item, at: drop.at });
      if (TURN_DEBUG) console.log("[LOOT]", enemy.id, "→", item, drop.at);
    }

    xp += enemy.xpValue;
  }

  if (xp <= 0) return;
  draft.events.push({ type: "xp_gained", amount: xp });

  const result = applyExperience(draft.player, xp);
  draft.player = result.player;
  for (const level of result.levelUps) draft.events.push({ type: "level_up", level });
  for (const unlock of result.unlocks) draft.events.push({ type: "unlock", unlock });
}
