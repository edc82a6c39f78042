// src/battleSystem/constants/enemies.ts

/**
 * Plantillas de enemigos.
 *
 * Valores fijos por tipo; debilidad/resistencia elemental NO van aquí,
 * se asignan por entrada del roster de cada oleada (fixtures).
 *
 * Orden de daño base: goblin < ogre (el archer pega menos pero desde lejos).
 */

export const ENEMY_TYPES = ["goblin", "archer", "ogre"] as const;
export type EnemyType = (typeof ENEMY_TYPES)[number];

export interface EnemyTemplate {
  type: EnemyType;
  health: number;
  /** Alcance de ataque (Manhattan) */
  attackRange: number;
  /** Daño base del ataque estándar */
  damage: number;
  /** XP que otorga al morir */
  xpValue: number;
}

export const ENEMY_TEMPLATES: Record<EnemyType, EnemyTemplate> = {
  goblin: { type: "goblin", health: 50, attackRange: 1, damage: 10, xpValue: 25 },
  archer: { type: "archer", health: 40, attackRange: 4, damage: 8, xpValue: 30 },
  ogre: { type: "ogre", health: 100, attackRange: 1, damage: 20, xpValue: 60 },
};
