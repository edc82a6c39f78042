/* eslint-disable no-console */
// src/config/game.ts
// Configuración por variables de entorno. La librería NO carga .env: eso lo hace
// el entrypoint (scripts/simulate.ts) con `import "dotenv/config"` antes de importar esto.

type Env = Record<string, string | undefined>;

const isTruthy = (v: string | undefined) => v === "1" || String(v || "").toLowerCase() === "true";

/** Nivel máximo (entero). Si no está en env o es inválido, usa 100. */
export function readMaxLevel(env: Env = process.env): number {
  const raw = env.MAX_LEVEL;
  const n = raw ? parseInt(raw, 10) : 100;
  return Number.isFinite(n) && n >= 1 ? n : 100;
}

/** Seed por defecto del CLI: número si parsea, si no el string tal cual. */
export function readDefaultSeed(env: Env = process.env): number | string {
  const raw = (env.GAME_SEED ?? "").trim();
  if (!raw) return 1;
  const n = Number(raw);
  return Number.isInteger(n) ? n : raw;
}

export function readTurnDebug(env: Env = process.env): boolean {
  return isTruthy(env.DEBUG_TURNS);
}

export const MAX_LEVEL = readMaxLevel();
export const TURN_DEBUG = readTurnDebug();

if (TURN_DEBUG) console.log(`[CONFIG] DEBUG_TURNS = ON, MAX_LEVEL = ${MAX_LEVEL}`);
