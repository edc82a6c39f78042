// Balance/constantes enteras y estables para el motor de turnos.
// No debe importar nada fuera de battleSystem (salvo constantes).
// Porcentajes como enteros 0..100; multiplicadores como fracción donde se indica.
// Cambiarlos rompe los tests de fórmulas: ajustar con cuidado.

/** Tamaño del tablero (cuadrado) */
export const GRID_SIZE = 20;

/** Dash */
export const DASH_MANA_COST = 15;
export const DASH_DISTANCE = 3;
export const DASH_COOLDOWN_TURNS = 3;

/** Pociones: cantidad fija restaurada (clamp al máximo) */
export const POTION_RESTORE_AMOUNT = 30;

/** Regeneración de maná al cierre del turno */
export const MANA_REGEN_PER_TURN = 2;
export const FOCUS_MANA_REGEN = 10;

/** Hechizo `self`: curación fija */
export const SELF_HEAL_AMOUNT = 20;

/** Minions (invocados o levantados) */
export const MINION_HEALTH = 40;
export const MINION_ATTACK_DAMAGE = 10;

/** Enemigos */
export const OGRE_STOMP_DAMAGE = 15;
export const GOBLIN_SWARM_BONUS = 2; // por cada otro goblin cercano
export const GOBLIN_SWARM_RADIUS = 3; // Manhattan
export const ARCHER_FOREST_DIVISOR = 2;

/** Modificadores de daño de hechizo (enteros %) */
export const WATER_CASTER_BONUS_PERCENT = 25;
export const WATER_TARGET_FIRE_PENALTY_PERCENT = 25;
export const WEAKNESS_BONUS_PERCENT = 50;
export const RESISTANCE_REDUCTION_PERCENT = 50;

/** Loot */
export const LOOT_DROP_CHANCE_PERCENT = 25;

/** Progresión */
export const XP_BASE = 100;
export const XP_MULTIPLIER = 1.5;
export const LEVEL_UP_MAX_HEALTH = 10;
export const LEVEL_UP_MAX_MANA = 5;
export const LEVEL_UP_SPELL_POWER = 2;
