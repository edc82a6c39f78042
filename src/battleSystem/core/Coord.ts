// src/battleSystem/core/Coord.ts
/**
 * Coordenadas de tablero con igualdad ESTRUCTURAL.
 * Un `Map` de JS compara objetos por referencia, así que las capas posicionales
 * (items, cadáveres, terreno) se indexan por `coordKey` ("x,y") y guardan la Coord original.
 */

export type Direction = "up" | "down" | "left" | "right";
export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

export interface Coord {
  readonly x: number;
  readonly y: number;
}

export const coordKey = (c: Coord) => `${c.x},${c.y}`;
export const sameCoord = (a: Coord, b: Coord) => a.x === b.x && a.y === b.y;
export const manhattan = (a: Coord, b: Coord) => Math.abs(a.x - b.x) + Math.abs(a.y - b.y);

export const DIRECTION_DELTAS: Record<Direction, Coord> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

export function isDirection(x: unknown): x is Direction {
  return typeof x === "string" && DIRECTIONS.some((d) => d === x);
}

export function stepCoord(c: Coord, dir: Direction, steps = 1): Coord {
  const d = DIRECTION_DELTAS[dir];
  return { x: c.x + d.x * steps, y: c.y + d.y * steps };
}

export function inBounds(c: Coord, gridSize: number): boolean {
  return c.x >= 0 && c.y >= 0 && c.x < gridSize && c.y < gridSize;
}

/** Vecinos ortogonales en orden up, down, left, right (sin filtrar por bordes). */
export function orthogonalNeighbors(c: Coord): Coord[] {
  return DIRECTIONS.map((d) => stepCoord(c, d));
}

/** Bloque 3×3 centrado en `c` (incluye el centro), sin filtrar por bordes. */
export function squareAround(c: Coord): Coord[] {
  const out: Coord[] = [];
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) out.push({ x: c.x + dx, y: c.y + dy });
  }
  return out;
}

/* ───────── Colecciones indexadas por coordenada ───────── */

export interface ReadonlyCoordMap<V> {
  readonly size: number;
  get(c: Coord): V | undefined;
  has(c: Coord): boolean;
  entries(): Array<[Coord, V]>;
  values(): V[];
}

export class CoordMap<V> implements ReadonlyCoordMap<V> {
  private readonly map = new Map<string, { at: Coord; value: V }>();

  constructor(entries?: Iterable<readonly [Coord, V]>) {
    if (entries) for (const [c, v] of entries) this.set(c, v);
  }

  get size(): number {
    return this.map.size;
  }
  get(c: Coord): V | undefined {
    return this.map.get(coordKey(c))?.value;
  }
  has(c: Coord): boolean {
    return this.map.has(coordKey(c));
  }
  set(c: Coord, value: V): this {
    // re-set conserva el orden de inserción original (Map lo hace por clave)
    this.map.set(coordKey(c), { at: { x: c.x, y: c.y }, value });
    return this;
  }
  delete(c: Coord): boolean {
    return this.map.delete(coordKey(c));
  }
  entries(): Array<[Coord, V]> {
    return [...this.map.values()].map((e) => [e.at, e.value]);
  }
  values(): V[] {
    return [...this.map.values()].map((e) => e.value);
  }
  clone(): CoordMap<V> {
    return new CoordMap(this.entries());
  }
}

export class CoordSet implements Iterable<Coord> {
  private readonly map = new Map<string, Coord>();

  constructor(coords?: Iterable<Coord>) {
    if (coords) for (const c of coords) this.add(c);
  }

  get size(): number {
    return this.map.size;
  }
  add(c: Coord): this {
    this.map.set(coordKey(c), { x: c.x, y: c.y });
    return this;
  }
  has(c: Coord): boolean {
    return this.map.has(coordKey(c));
  }
  delete(c: Coord): boolean {
    return this.map.delete(coordKey(c));
  }
  values(): Coord[] {
    return [...this.map.values()];
  }
  [Symbol.iterator](): Iterator<Coord> {
    return this.map.values();
  }
}
