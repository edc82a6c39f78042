// src/battleSystem/core/turnPhases/enemyPhase.ts
/* eslint-disable no-console */
import { OGRE_STOMP_DAMAGE } from "../CombatConfig";
import { CoordSet, sameCoord } from "../Coord";
import type { Coord } from "../Coord";
import { advanceWithOccupancy, chooseEnemyTarget } from "../CombatAI";
import type { EnemyTarget } from "../CombatAI";
import { enemyAttackDamage, stompArea } from "../CombatResolver";
import { cannotAct } from "../StatusEngine";
import { tileAt } from "../Grid";
import type { Enemy } from "../CombatTypes";
import { damagePlayer } from "../../entities/Player";
import { damageMinion } from "../../entities/Minion";
import { isDefeated, moveEnemy } from "../../entities/Enemy";
import { TURN_DEBUG } from "../../../config/game";
import type { TurnContext } from "./context";

/** Quita minions con vida ≤ 0 (sin cadáver) y libera sus casillas. */
function dropLostMinions(ctx: TurnContext, occupied: CoordSet): void {
  const { draft } = ctx;
  const lost = draft.minions.filter(isDefeated);
  for (const m of lost) {
    occupied.delete(m.position);
    draft.events.push({ type: "minion_lost", minionId: m.id });
  }
  if (lost.length) draft.minions = draft.minions.filter((m) => !isDefeated(m));
}

function stomp(ctx: TurnContext, ogre: Enemy, occupied: CoordSet): void {
  const { draft } = ctx;
  const area = stompArea(ogre.position);

  const hitPlayer = area.has(draft.player.position);
  if (hitPlayer) draft.player = damagePlayer(draft.player, OGRE_STOMP_DAMAGE);

  const minionIds: string[] = [];
  draft.minions = draft.minions.map((m) => {
    if (!area.has(m.position)) return m;
    minionIds.push(m.id);
    return damageMinion(m, OGRE_STOMP_DAMAGE);
  });

  draft.events.push({ type: "stomp", enemyId: ogre.id, hitPlayer, minionIds, damage: OGRE_STOMP_DAMAGE });
  dropLostMinions(ctx, occupied);
}

function strike(ctx: TurnContext, enemy: Enemy, target: EnemyTarget, occupied: CoordSet): void {
  const { draft } = ctx;
  const { damage, swarmBonus } = enemyAttackDamage(enemy, tileAt(draft.grid, target.position), draft.enemies);

  if (target.kind === "player") {
    draft.player = damagePlayer(draft.player, damage);
    draft.events.push({ type: "enemy_attack", enemyId: enemy.id, target: { kind: "player" }, damage, swarmBonus });
    return;
  }

  const victimId = target.minion.id;
  draft.minions = draft.minions.map((m) => (m.id === victimId ? damageMinion(m, damage) : m));
  draft.events.push({ type: "enemy_attack", enemyId: enemy.id, target: { kind: "minion", id: victimId }, damage, swarmBonus });
  dropLostMinions(ctx, occupied);
}

/**
 * Fase 4: cada enemigo (en orden de roster) pierde el turno si está congelado,
 * ataca si su objetivo está en rango, o avanza un paso.
 * Un enemigo congelado sigue ocupando su casilla.
 */
export function runEnemyPhase(ctx: TurnContext): void {
  const { draft } = ctx;
  if (!draft.enemies.length) return;

  const occupied = new CoordSet([draft.player.position, ...draft.enemies.map((e) => e.position), ...draft.minions.map((m) => m.position)]);

  for (let i = 0; i < draft.enemies.length; i++) {
    const enemy = draft.enemies[i];

    if (cannotAct(enemy.statusEffects)) {
      draft.events.push({ type: "enemy_skip", enemyId: enemy.id, reason: "frozen" });
      continue;
    }

    const target = chooseEnemyTarget(enemy, draft.player, draft.minions);

    if (target.distance <= enemy.attackRange) {
      if (enemy.type === "ogre" && target.distance === 1) stomp(ctx, enemy, occupied);
      else strike(ctx, enemy, target, occupied);
      continue;
    }

    const from: Coord = enemy.position;
    const to = advanceWithOccupancy(from, target.position, draft.grid, occupied);
    if (sameCoord(to, from)) continue;
    draft.enemies[i] = moveEnemy(enemy, to);
    draft.events.push({ type: "enemy_move", enemyId: enemy.id, from, to });
  }

  if (TURN_DEBUG) console.log("[TURN] enemy phase", { player: draft.player.health, minions: draft.minions.length });
}
