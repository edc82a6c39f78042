// src/services/progression.service.ts
/* eslint-disable no-console */
import type { Player } from "../battleSystem/core/CombatTypes";
import type { SpellElement, SpellShape } from "../battleSystem/constants/spells";
import type { Unlock } from "../battleSystem/constants/unlocks";
import { unlockForLevel } from "../battleSystem/constants/unlocks";
import { LEVEL_UP_MAX_HEALTH, LEVEL_UP_MAX_MANA, LEVEL_UP_SPELL_POWER, XP_BASE, XP_MULTIPLIER } from "../battleSystem/core/CombatConfig";
import { updatePlayer } from "../battleSystem/entities/Player";
import { MAX_LEVEL, TURN_DEBUG } from "../config/game";

/** Métricas de progresión para UI/CLI (todo en enteros) */
export type ProgressionMetrics = {
  level: number;
  xp: number; // XP dentro del nivel actual
  xpToNext: number; // XP restante para subir (0 si es el máximo)
  xpPercentInt: number; // progreso 0..100 (entero)
  isMaxLevel: boolean;
};

export type ExperienceResult = {
  player: Player;
  /** Niveles alcanzados, en orden */
  levelUps: number[];
  unlocks: Unlock[];
};

/**
 * XP necesaria para pasar de `level` a `level + 1`.
 * base × multiplicador^(level−1), redondeado: 100, 150, 225, 338…
 */
export function xpToNextLevelFor(level: number): number {
  const lvl = Math.max(1, Math.trunc(level));
  return Math.round(XP_BASE * Math.pow(XP_MULTIPLIER, lvl - 1));
}

function withUnlock(player: Player, unlock: Unlock | null): Pick<Player, "unlockedElements" | "unlockedSpellShapes"> {
  if (!unlock) return { unlockedElements: player.unlockedElements, unlockedSpellShapes: player.unlockedSpellShapes };
  if (unlock.kind === "element") {
    return { unlockedElements: new Set<SpellElement>([...player.unlockedElements, unlock.element]), unlockedSpellShapes: player.unlockedSpellShapes };
  }
  return { unlockedElements: player.unlockedElements, unlockedSpellShapes: new Set<SpellShape>([...player.unlockedSpellShapes, unlock.shape]) };
}

/**
 * Suma XP y sube niveles en bucle (un premio grande puede cruzar varios umbrales).
 * Cada subida: arrastra el sobrante, +10 vida máx, +5 maná máx, restaura ambos, +2 spellPower
 * y aplica el desbloqueo de la tabla si lo hay. En el tope la XP sigue acumulándose sin subir.
 */
export function applyExperience(player: Player, gained: number, maxLevel: number = MAX_LEVEL): ExperienceResult {
  const add = Math.max(0, Math.trunc(gained || 0));
  let p = updatePlayer(player, { xp: player.xp + add });
  const levelUps: number[] = [];
  const unlocks: Unlock[] = [];

  while (p.level < maxLevel && p.xp >= p.xpToNextLevel) {
    const level = p.level + 1;
    const maxHealth = p.maxHealth + LEVEL_UP_MAX_HEALTH;
    const maxMana = p.maxMana + LEVEL_UP_MAX_MANA;
    const unlock = unlockForLevel(level);

    p = updatePlayer(p, {
      xp: p.xp - p.xpToNextLevel,
      level,
      maxHealth,
      health: maxHealth,
      maxMana,
      mana: maxMana,
      spellPower: p.spellPower + LEVEL_UP_SPELL_POWER,
      xpToNextLevel: xpToNextLevelFor(level),
      ...withUnlock(p, unlock),
    });

    levelUps.push(level);
    if (unlock) unlocks.push(unlock);
  }

  if (TURN_DEBUG && add > 0) console.log("[XP]", { gained: add, level: p.level, xp: p.xp, levelUps });
  return { player: p, levelUps, unlocks };
}

/** Progreso dentro del nivel actual, en enteros. */
export function computeProgression(player: Pick<Player, "level" | "xp" | "xpToNextLevel">, maxLevel: number = MAX_LEVEL): ProgressionMetrics {
  const level = Math.max(1, Math.trunc(player.level));
  const isMaxLevel = level >= maxLevel;
  const width = Math.max(1, player.xpToNextLevel);
  const xp = Math.max(0, Math.trunc(player.xp));

  return {
    level,
    xp,
    xpToNext: isMaxLevel ? 0 : Math.max(0, width - xp),
    xpPercentInt: isMaxLevel ? 100 : Math.min(100, Math.trunc((xp * 100) / width)),
    isMaxLevel,
  };
}
