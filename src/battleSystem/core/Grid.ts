// src/battleSystem/core/Grid.ts
// Matriz de tipos de casilla, indexada grid[y][x]. Sin lógica de juego: solo almacenamiento y bordes.
import type { Coord } from "./Coord";
import { inBounds } from "./Coord";
import type { Grid, TileType } from "./CombatTypes";

export type MutableGrid = TileType[][];

export type StaticTile = { x: number; y: number; tile: Extract<TileType, "obstacle" | "water" | "forest"> };

/** Tablero vacío + terreno estático (lo que sobrevive a un cambio de oleada). */
export function buildStaticGrid(size: number, terrain: readonly StaticTile[]): MutableGrid {
  const grid: MutableGrid = Array.from({ length: size }, () => Array.from({ length: size }, (): TileType => "empty"));
  for (const t of terrain) {
    if (inBounds(t, size)) grid[t.y][t.x] = t.tile;
  }
  return grid;
}

export function cloneGrid(grid: Grid): MutableGrid {
  return grid.map((row) => [...row]);
}

/** `undefined` fuera del tablero. */
export function tileAt(grid: Grid, c: Coord): TileType | undefined {
  if (!inBounds(c, grid.length)) return undefined;
  return grid[c.y][c.x];
}

export function setTile(grid: MutableGrid, c: Coord, tile: TileType): void {
  if (inBounds(c, grid.length)) grid[c.y][c.x] = tile;
}

/** El jugador no entra en obstáculos ni cadáveres. */
export function blocksPlayer(tile: TileType | undefined): boolean {
  return tile === undefined || tile === "obstacle" || tile === "corpse";
}

/** Casilla base del layout estático en `c` (lo que queda debajo de un cadáver o un item). */
export function staticTileAt(terrain: readonly StaticTile[], c: Coord): TileType {
  return terrain.find((t) => t.x === c.x && t.y === c.y)?.tile ?? "empty";
}
