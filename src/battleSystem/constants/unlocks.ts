// src/battleSystem/constants/unlocks.ts
import type { SpellElement, SpellShape } from "./spells";

export type Unlock = { kind: "element"; element: SpellElement } | { kind: "shape"; shape: SpellShape };

/** Qué se desbloquea al ALCANZAR cada nivel (un único elemento o forma por nivel). */
export const LEVEL_UNLOCKS: Readonly<Record<number, Unlock>> = {
  2: { kind: "element", element: "water" },
  3: { kind: "shape", shape: "cone" },
  4: { kind: "element", element: "earth" },
  5: { kind: "shape", shape: "wall" },
  6: { kind: "element", element: "air" },
  7: { kind: "shape", shape: "self" },
  8: { kind: "shape", shape: "summon" },
  9: { kind: "shape", shape: "raiseDead" },
};

export function unlockForLevel(level: number): Unlock | null {
  return LEVEL_UNLOCKS[level] ?? null;
}
