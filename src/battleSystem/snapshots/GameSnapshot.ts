// src/battleSystem/snapshots/GameSnapshot.ts
// Copia de trabajo mutable de un GameState y su commit a un snapshot nuevo.
// ❗ Nada de lo que toque la copia de trabajo puede filtrarse al snapshot de entrada:
//    grid y mapas se clonan; las entidades son registros inmutables y se reemplazan, no se mutan.

import type { Corpse, Enemy, GameState, GameStatus, Item, Minion, Player, TerrainEffect, TurnEvent } from "../core/CombatTypes";
import { CoordMap } from "../core/Coord";
import type { ReadonlyCoordMap } from "../core/Coord";
import type { MutableGrid } from "../core/Grid";
import { cloneGrid } from "../core/Grid";

export type WorkingState = {
  gridSize: number;
  grid: MutableGrid;
  player: Player;
  enemies: Enemy[];
  minions: Minion[];
  itemsOnGrid: CoordMap<Item>;
  corpsesOnGrid: CoordMap<Corpse>;
  terrainEffects: CoordMap<TerrainEffect>;
  status: GameStatus;
  wave: number;
  turn: number;
  nextId: number;
  /** Arranca vacío: cada acción produce su propia lista */
  events: TurnEvent[];
};

const cloneMap = <V>(m: ReadonlyCoordMap<V>) => new CoordMap<V>(m.entries());

export function openWorkingCopy(state: GameState): WorkingState {
  return {
    gridSize: state.gridSize,
    grid: cloneGrid(state.grid),
    player: state.player,
    enemies: [...state.enemies],
    minions: [...state.minions],
    itemsOnGrid: cloneMap(state.itemsOnGrid),
    corpsesOnGrid: cloneMap(state.corpsesOnGrid),
    terrainEffects: cloneMap(state.terrainEffects),
    status: state.status,
    wave: state.wave,
    turn: state.turn,
    nextId: state.nextId,
    events: [],
  };
}

/** Commit atómico: el snapshot resultante no comparte nada mutable con la copia de trabajo. */
export function commitSnapshot(draft: WorkingState): GameState {
  return {
    gridSize: draft.gridSize,
    grid: cloneGrid(draft.grid),
    player: draft.player,
    enemies: [...draft.enemies],
    minions: [...draft.minions],
    itemsOnGrid: draft.itemsOnGrid.clone(),
    corpsesOnGrid: draft.corpsesOnGrid.clone(),
    terrainEffects: draft.terrainEffects.clone(),
    status: draft.status,
    wave: draft.wave,
    turn: draft.turn,
    nextId: draft.nextId,
    events: [...draft.events],
  };
}

/** Reserva un id de partida (`minion_3`, `item_4`…). */
export function takeId(draft: WorkingState, prefix: string): string {
  const id = `${prefix}_${draft.nextId}`;
  draft.nextId += 1;
  return id;
}
