// Fórmulas de daño, aplicación de estados y empuje (pushback).
// Devuelve listas nuevas + eventos; NO decide el orden de fases (eso es TurnPipeline).
import type { SpellElement } from "../constants/spells";
import { ELEMENT_BASE_DAMAGE } from "../constants/spells";
import { ENEMY_TEMPLATES } from "../constants/enemies";
import {
  ARCHER_FOREST_DIVISOR,
  GOBLIN_SWARM_BONUS,
  GOBLIN_SWARM_RADIUS,
  RESISTANCE_REDUCTION_PERCENT,
  WATER_CASTER_BONUS_PERCENT,
  WATER_TARGET_FIRE_PENALTY_PERCENT,
  WEAKNESS_BONUS_PERCENT,
} from "./CombatConfig";
import { scalePct, sign } from "./CombatMath";
import type { Enemy, Grid, TileType, TurnEvent } from "./CombatTypes";
import type { Coord } from "./Coord";
import { CoordSet, inBounds, manhattan, squareAround } from "./Coord";
import { tileAt } from "./Grid";
import { refreshStatus } from "./StatusEngine";
import { damageEnemy, isDefeated, moveEnemy, withStatuses } from "../entities/Enemy";

export type SpellDamageInput = {
  element: SpellElement;
  spellPower: number;
  casterTile?: TileType;
  targetTile?: TileType;
  weakness?: SpellElement;
  resistance?: SpellElement;
};

/**
 * (base + spellPower) × modificadores en orden:
 *   caster en agua lanzando water (+25%) → fire sobre objetivo en agua (−25%)
 *   → debilidad (×1.5) → resistencia (×0.5); redondeo al final.
 */
export function computeSpellDamage(i: SpellDamageInput): number {
  let dmg = ELEMENT_BASE_DAMAGE[i.element] + i.spellPower;
  if (i.element === "water" && i.casterTile === "water") dmg = scalePct(dmg, 100 + WATER_CASTER_BONUS_PERCENT);
  if (i.element === "fire" && i.targetTile === "water") dmg = scalePct(dmg, 100 - WATER_TARGET_FIRE_PENALTY_PERCENT);
  if (i.weakness === i.element) dmg = scalePct(dmg, 100 + WEAKNESS_BONUS_PERCENT);
  if (i.resistance === i.element) dmg = scalePct(dmg, 100 - RESISTANCE_REDUCTION_PERCENT);
  return Math.round(dmg);
}

export type SpellResolution = {
  /** Roster sobreviviente (mismo orden) */
  enemies: Enemy[];
  /** Muertos por el hechizo, en orden de roster */
  defeated: Enemy[];
  events: TurnEvent[];
};

/**
 * Daño → estado (fire=burn, water=frozen) → pushback (air) sobre los sobrevivientes golpeados.
 * La ocupación del pushback arranca con los enemigos vivos + `blockers` (minions) y se actualiza
 * enemigo por enemigo.
 */
export function resolveElementalSpell(args: {
  enemies: readonly Enemy[];
  tiles: CoordSet;
  element: SpellElement;
  caster: { position: Coord; spellPower: number };
  grid: Grid;
  blockers?: readonly Coord[];
}): SpellResolution {
  const { tiles, element, caster, grid } = args;
  const events: TurnEvent[] = [];
  const casterTile = tileAt(grid, caster.position);
  const struck = new Set<string>();

  const afterHit = args.enemies.map((e) => {
    if (!tiles.has(e.position)) return e;
    struck.add(e.id);

    const damage = computeSpellDamage({
      element,
      spellPower: caster.spellPower,
      casterTile,
      targetTile: tileAt(grid, e.position),
      weakness: e.weakness,
      resistance: e.resistance,
    });
    let next = damageEnemy(e, damage);
    events.push({ type: "spell_hit", enemyId: e.id, damage, healthAfter: next.health });

    if (!isDefeated(next)) {
      const key = element === "fire" ? "burn" : element === "water" ? "frozen" : null;
      if (key) {
        next = withStatuses(next, refreshStatus(next.statusEffects, key));
        const applied = next.statusEffects[next.statusEffects.length - 1];
        events.push({ type: "status_applied", enemyId: e.id, key, duration: applied.duration });
      }
    }
    return next;
  });

  const defeated = afterHit.filter(isDefeated);
  let alive = afterHit.filter((e) => !isDefeated(e));

  if (element === "air") {
    const occupied = new CoordSet([...alive.map((e) => e.position), ...(args.blockers ?? [])]);
    alive = alive.map((e) => {
      if (!struck.has(e.id)) return e;
      const to = pushbackDestination(caster.position, e.position);
      if (!to || !inBounds(to, grid.length) || tileAt(grid, to) !== "empty" || occupied.has(to)) return e;
      occupied.delete(e.position);
      occupied.add(to);
      events.push({ type: "pushback", enemyId: e.id, from: e.position, to });
      return moveEnemy(e, to);
    });
  }

  return { enemies: alive, defeated, events };
}

/** Un paso alejándose del lanzador por el eje dominante (empate ⇒ vertical). */
export function pushbackDestination(caster: Coord, target: Coord): Coord | null {
  const dx = target.x - caster.x;
  const dy = target.y - caster.y;
  if (dx === 0 && dy === 0) return null;
  if (Math.abs(dx) > Math.abs(dy)) return { x: target.x + sign(dx), y: target.y };
  return { x: target.x, y: target.y + sign(dy) };
}

/* ───────── Ataques enemigos ───────── */

export function countNearbyGoblins(attacker: Enemy, enemies: readonly Enemy[]): number {
  return enemies.filter((o) => o.id !== attacker.id && o.type === "goblin" && manhattan(o.position, attacker.position) <= GOBLIN_SWARM_RADIUS).length;
}

/** Daño del ataque estándar: base por tipo, archer/2 contra bosque, + bonus de enjambre goblin. */
export function enemyAttackDamage(attacker: Enemy, targetTile: TileType | undefined, enemies: readonly Enemy[]): { damage: number; swarmBonus: number } {
  let base = ENEMY_TEMPLATES[attacker.type].damage;
  if (attacker.type === "archer" && targetTile === "forest") base = base / ARCHER_FOREST_DIVISOR;
  const swarmBonus = attacker.type === "goblin" ? GOBLIN_SWARM_BONUS * countNearbyGoblins(attacker, enemies) : 0;
  return { damage: Math.round(base + swarmBonus), swarmBonus };
}

/** Área del pisotón del ogro: su vecindad 3×3. */
export function stompArea(center: Coord): CoordSet {
  return new CoordSet(squareAround(center));
}
