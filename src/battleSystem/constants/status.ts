/**
 * Definiciones base de estados (sobre enemigos) y efectos de terreno (sobre casillas).
 * - Solo estructura y metadata legible por UI/runner.
 * - Todo en ENTEROS (daño por turno, turnos).
 * - No hay stacks: re-aplicar un estado lo REFRESCA (se quita y se vuelve a poner).
 */

export const STATUS_KEYS = ["burn", "frozen"] as const;
export type StatusKey = (typeof STATUS_KEYS)[number];

export const TERRAIN_EFFECT_KEYS = ["burning"] as const;
export type TerrainEffectKey = (typeof TERRAIN_EFFECT_KEYS)[number];

/** Definición legible de un estado. */
export interface StatusDef {
  key: StatusKey;
  name: string;
  description?: string;
  /** Tags libres para UI/filtrado (“dot”, “control”, etc.) */
  tags?: string[];
  /** Duración al aplicarse, en turnos */
  baseDuration: number;
  /** Daño por turno mientras dure (0 ⇒ no es DoT) */
  tickDamage: number;
  /** true ⇒ el enemigo pierde su turno (ni ataca ni se mueve) */
  skipsTurn: boolean;
}

export interface TerrainEffectDef {
  key: TerrainEffectKey;
  name: string;
  baseDuration: number;
  /** Daño a quien esté parado en la casilla al inicio del turno */
  tickDamage: number;
}

export const STATUS_CATALOG: Record<StatusKey, StatusDef> = {
  burn: {
    key: "burn",
    name: "Burn",
    description: "Damage over time from fire.",
    tags: ["dot", "fire"],
    baseDuration: 3,
    tickDamage: 5,
    skipsTurn: false,
  },

  frozen: {
    key: "frozen",
    name: "Frozen",
    description: "Cannot act while frozen.",
    tags: ["control", "water"],
    baseDuration: 2,
    tickDamage: 0,
    skipsTurn: true,
  },
};

export const TERRAIN_EFFECT_CATALOG: Record<TerrainEffectKey, TerrainEffectDef> = {
  burning: {
    key: "burning",
    name: "Burning ground",
    baseDuration: 3,
    tickDamage: 5,
  },
};

/* ───────────────────────── Helpers exportados ───────────────────────── */

export function getStatusDef(key: StatusKey): StatusDef {
  return STATUS_CATALOG[key];
}

/** Duración por defecto en turnos (≥1) para inicializar efectos. */
export function defaultDuration(key: StatusKey): number {
  const d = Math.trunc(getStatusDef(key).baseDuration);
  return d >= 1 ? d : 1;
}

/**
 * 📌 Notas de mapeo (elemento → estado):
 *   fire  → aplica `burn`
 *   water → aplica `frozen`
 *   fire + wall → además deja `burning` en el suelo
 *
 * Los minions NO reciben estados ni daño de terreno (decisión de producto vigente).
 */
