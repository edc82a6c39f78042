// src/battleSystem/constants/spells.ts
/**
 * Catálogo de hechizos: elementos, formas, daño base y coste de maná.
 *
 * Un hechizo = elemento + forma. El elemento decide el daño y el estado que aplica;
 * la forma decide la geometría (ver core/SpellGeometry.ts) y el coste.
 */

export const SPELL_ELEMENTS = ["fire", "water", "earth", "air"] as const;
export type SpellElement = (typeof SPELL_ELEMENTS)[number];

export const SPELL_SHAPES = ["ball", "cone", "wall", "self", "summon", "raiseDead"] as const;
export type SpellShape = (typeof SPELL_SHAPES)[number];

/** Daño base por elemento (enteros, fire > water > earth > air). */
export const ELEMENT_BASE_DAMAGE: Record<SpellElement, number> = {
  fire: 30,
  water: 25,
  earth: 20,
  air: 15,
};

/** Coste de maná por forma. */
export const SHAPE_MANA_COST: Record<SpellShape, number> = {
  ball: 10,
  cone: 20,
  wall: 25,
  self: 15,
  summon: 30,
  raiseDead: 35,
};

export function isSpellElement(x: unknown): x is SpellElement {
  return typeof x === "string" && SPELL_ELEMENTS.some((e) => e === x);
}

export function isSpellShape(x: unknown): x is SpellShape {
  return typeof x === "string" && SPELL_SHAPES.some((s) => s === x);
}
