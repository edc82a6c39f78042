// src/battleSystem/core/StatusEngine.ts
/* eslint-disable no-console */
/**
 * Estados activos sobre enemigos y efectos de terreno sobre casillas.
 * - Sin stacks: aplicar un estado que ya existe lo REFRESCA (quita + pone fresco).
 * - El tick suma el daño de todos los estados, decrementa TODAS las duraciones
 *   y descarta los que llegan a 0. Un tick por turno resuelto.
 * - Funciones puras: reciben listas y devuelven listas nuevas.
 */

import { STATUS_CATALOG, TERRAIN_EFFECT_CATALOG, defaultDuration } from "../constants/status";
import type { StatusKey } from "../constants/status";
import type { StatusEffect, TerrainEffect } from "./CombatTypes";
import { TURN_DEBUG } from "../../config/game";

export type StatusTick = {
  damage: number;
  remaining: StatusEffect[];
  expired: StatusKey[];
};

/** Quita cualquier instancia previa de `key` y agrega una nueva con duración completa. */
export function refreshStatus(effects: readonly StatusEffect[], key: StatusKey, duration = defaultDuration(key)): StatusEffect[] {
  return [...effects.filter((s) => s.type !== key), { type: key, duration }];
}

/** ¿Pierde el turno? (frozen) */
export function cannotAct(effects: readonly StatusEffect[]): boolean {
  return effects.some((s) => s.duration > 0 && STATUS_CATALOG[s.type].skipsTurn);
}

export function tickStatuses(effects: readonly StatusEffect[]): StatusTick {
  let damage = 0;
  const remaining: StatusEffect[] = [];
  const expired: StatusKey[] = [];

  for (const s of effects) {
    damage += STATUS_CATALOG[s.type].tickDamage;
    const duration = s.duration - 1;
    if (duration > 0) remaining.push({ type: s.type, duration });
    else expired.push(s.type);
  }

  if (TURN_DEBUG && effects.length) console.log("[STATUS] tick", { damage, remaining, expired });
  return { damage, remaining, expired };
}

/* ───────── Terreno ───────── */

export function freshTerrainEffect(key: TerrainEffect["type"]): TerrainEffect {
  return { type: key, duration: TERRAIN_EFFECT_CATALOG[key].baseDuration };
}

export function terrainTickDamage(effect: TerrainEffect): number {
  return TERRAIN_EFFECT_CATALOG[effect.type].tickDamage;
}

/** Decrementa; `null` ⇒ expiró y debe salir del mapa. */
export function decayTerrainEffect(effect: TerrainEffect): TerrainEffect | null {
  const duration = effect.duration - 1;
  return duration > 0 ? { type: effect.type, duration } : null;
}
