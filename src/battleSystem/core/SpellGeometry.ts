// src/battleSystem/core/SpellGeometry.ts
// (forma, objetivo, posición/orientación del lanzador, tamaño del tablero) → casillas afectadas.
// Función pura: no mira entidades ni tipos de casilla.
import type { SpellShape } from "../constants/spells";
import type { Coord, Direction } from "./Coord";
import { CoordSet, inBounds, squareAround } from "./Coord";

export type GeometryInput = {
  shape: SpellShape;
  target?: Coord | null;
  caster: Coord;
  facing: Direction;
  gridSize: number;
};

/**
 * Flecha de 4 casillas relativa al lanzador: una adelante y tres a dos pasos
 * (izquierda/centro/derecha respecto de la dirección).
 */
const CONE_TEMPLATES: Record<Direction, readonly Coord[]> = {
  up: [
    { x: 0, y: -1 },
    { x: -1, y: -2 },
    { x: 0, y: -2 },
    { x: 1, y: -2 },
  ],
  down: [
    { x: 0, y: 1 },
    { x: -1, y: 2 },
    { x: 0, y: 2 },
    { x: 1, y: 2 },
  ],
  left: [
    { x: -1, y: 0 },
    { x: -2, y: -1 },
    { x: -2, y: 0 },
    { x: -2, y: 1 },
  ],
  right: [
    { x: 1, y: 0 },
    { x: 2, y: -1 },
    { x: 2, y: 0 },
    { x: 2, y: 1 },
  ],
};

/** Eje con mayor |delta|; empate ⇒ vertical. Objetivo == lanzador ⇒ orientación actual. */
export function coneDirection(caster: Coord, target: Coord, facing: Direction): Direction {
  const dx = target.x - caster.x;
  const dy = target.y - caster.y;
  if (dx === 0 && dy === 0) return facing;
  if (Math.abs(dx) > Math.abs(dy)) return dx > 0 ? "right" : "left";
  return dy > 0 ? "down" : "up";
}

function clipped(coords: Iterable<Coord>, gridSize: number): CoordSet {
  const out = new CoordSet();
  for (const c of coords) if (inBounds(c, gridSize)) out.add(c);
  return out;
}

export function affectedTilesFor({ shape, target, caster, facing, gridSize }: GeometryInput): CoordSet {
  if (!target) return new CoordSet();

  switch (shape) {
    case "self":
      return new CoordSet();
    case "ball":
    case "summon":
    case "raiseDead":
      return clipped([target], gridSize);
    case "cone": {
      const dir = coneDirection(caster, target, facing);
      return clipped(
        CONE_TEMPLATES[dir].map((o) => ({ x: caster.x + o.x, y: caster.y + o.y })),
        gridSize
      );
    }
    case "wall":
      return clipped(squareAround(target), gridSize);
  }
}
