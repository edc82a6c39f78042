// src/battleSystem/core/CombatAI.ts
// Selección de objetivo más cercano (Manhattan) y paso hacia el objetivo.
import type { Enemy, Grid, Minion, Player } from "./CombatTypes";
import type { Coord, CoordSet } from "./Coord";
import { inBounds, manhattan, sameCoord } from "./Coord";
import { sign } from "./CombatMath";
import { tileAt } from "./Grid";

/** Enemigo más cercano; empate ⇒ el primero del roster. */
export function nearestEnemy(from: Coord, enemies: readonly Enemy[]): { enemy: Enemy; distance: number } | null {
  let best: { enemy: Enemy; distance: number } | null = null;
  for (const enemy of enemies) {
    const distance = manhattan(from, enemy.position);
    if (!best || distance < best.distance) best = { enemy, distance };
  }
  return best;
}

export type EnemyTarget = { kind: "player"; position: Coord; distance: number } | { kind: "minion"; minion: Minion; position: Coord; distance: number };

/** El jugador es la base; un minion solo lo reemplaza si está ESTRICTAMENTE más cerca. */
export function chooseEnemyTarget(enemy: Enemy, player: Player, minions: readonly Minion[]): EnemyTarget {
  let target: EnemyTarget = { kind: "player", position: player.position, distance: manhattan(enemy.position, player.position) };
  for (const minion of minions) {
    const distance = manhattan(enemy.position, minion.position);
    if (distance < target.distance) target = { kind: "minion", minion, position: minion.position, distance };
  }
  return target;
}

/** Un paso por el eje más largo; empate ⇒ horizontal. */
export function stepToward(from: Coord, to: Coord): Coord {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  if (dx === 0 && dy === 0) return from;
  if (Math.abs(dx) >= Math.abs(dy)) return { x: from.x + sign(dx), y: from.y };
  return { x: from.x, y: from.y + sign(dy) };
}

/**
 * Intenta el paso; si la casilla es obstáculo, está fuera o ya está reclamada, se queda.
 * Actualiza `occupied` in-place (libera la casilla vieja y reclama la nueva).
 */
export function advanceWithOccupancy(from: Coord, to: Coord, grid: Grid, occupied: CoordSet): Coord {
  const proposed = stepToward(from, to);
  if (sameCoord(proposed, from)) return from;
  if (!inBounds(proposed, grid.length) || tileAt(grid, proposed) === "obstacle" || occupied.has(proposed)) return from;
  occupied.delete(from);
  occupied.add(proposed);
  return proposed;
}
