// src/battleSystem/core/RngSeed.ts
/* eslint-disable no-console */
// Fuente de azar del motor. Todo lo aleatorio de un turno (drop de loot, tipo de poción,
// orden de casillas candidatas) consume UNA `Rng` inyectada: misma seed ⇒ misma partida.
import { TURN_DEBUG } from "../../config/game";

export type Rng = () => number;

/** FNV-1a 32-bit, para seeds en texto (`--seed=partida-1`). */
export function hash32(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h = Math.imul(h ^ str.charCodeAt(i), 0x01000193) >>> 0;
  }
  return h;
}

/** Mulberry32 en [0,1). Seed 0 se trata como 1. */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0 || 1;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function rngFromString(s: string): Rng {
  return mulberry32(hash32(s));
}

/** Seed del engine/CLI: número ⇒ mulberry32 directo, texto ⇒ hasheado. */
export function seededRng(seed: number | string): Rng {
  if (TURN_DEBUG) console.log("[RNG] seed:", seed);
  return typeof seed === "number" ? mulberry32(seed) : rngFromString(seed);
}

/** Entero en [min, max], ambos incluidos. */
export function rollInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/** `percent` sobre 100 (0..100). */
export function chance(rng: Rng, percent: number): boolean {
  return rng() < Math.max(0, Math.min(100, percent)) / 100;
}

/** Fisher–Yates sobre una copia (orden de candidatas de loot). */
export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = rollInt(rng, 0, i);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
