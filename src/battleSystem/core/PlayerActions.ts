// src/battleSystem/core/PlayerActions.ts
/**
 * Reducers puros `(state, …) → state` para cada acción del jugador.
 * - Fuera de `playing` todo es no-op salvo `restart`.
 * - Un no-op devuelve EL MISMO objeto de estado (sin turno, sin eventos nuevos).
 * - Las acciones que consumen turno abren una copia de trabajo y la pasan a `resolveTurn`.
 */
import type { SpellElement, SpellShape } from "../constants/spells";
import { SHAPE_MANA_COST } from "../constants/spells";
import { DASH_COOLDOWN_TURNS, DASH_DISTANCE, DASH_MANA_COST, POTION_RESTORE_AMOUNT, SELF_HEAL_AMOUNT } from "./CombatConfig";
import type { GameState, Item, PlayerAction } from "./CombatTypes";
import type { Coord, CoordSet, Direction } from "./Coord";
import { inBounds, sameCoord, stepCoord } from "./Coord";
import { blocksPlayer, setTile, staticTileAt, tileAt } from "./Grid";
import type { Rng } from "./RngSeed";
import { affectedTilesFor } from "./SpellGeometry";
import { resolveElementalSpell } from "./CombatResolver";
import { freshTerrainEffect } from "./StatusEngine";
import { resolveTurn } from "./TurnPipeline";
import type { WorkingState } from "../snapshots/GameSnapshot";
import { openWorkingCopy, takeId } from "../snapshots/GameSnapshot";
import { healPlayer, restoreMana, spendMana, updatePlayer } from "../entities/Player";
import { createMinion } from "../entities/Minion";
import { STATIC_TERRAIN } from "../fixtures/Fixtures";
import { createInitialState } from "../../services/wave.service";

const isPlaying = (state: GameState) => state.status === "playing";

/** Si hay un item en `at`, pasa al inventario y la casilla vuelve a `empty`. */
function pickUpAt(draft: WorkingState, at: Coord): void {
  const item = draft.itemsOnGrid.get(at);
  if (!item) return;
  draft.itemsOnGrid.delete(at);
  setTile(draft.grid, at, "empty");
  draft.player = updatePlayer(draft.player, { inventory: [...draft.player.inventory, item] });
  draft.events.push({ type: "item_picked", item, at });
}

/* ───────── Movimiento ───────── */

/** Un paso. La orientación cambia siempre y el turno se consume aunque el paso esté bloqueado. */
export function move(state: GameState, direction: Direction, rng: Rng): GameState {
  if (!isPlaying(state)) return state;

  const draft = openWorkingCopy(state);
  const from = state.player.position;
  const dest = stepCoord(from, direction);
  const blocked = blocksPlayer(tileAt(draft.grid, dest));

  draft.player = updatePlayer(draft.player, { facing: direction, position: blocked ? from : dest });
  draft.events.push({ type: "move", from, to: draft.player.position, facing: direction, blocked });
  if (!blocked) pickUpAt(draft, dest);

  return resolveTurn(draft, rng);
}

/** Hasta DASH_DISTANCE casillas, frenando en el primer obstáculo/cadáver/borde. Recoge items en el camino. */
export function dash(state: GameState, direction: Direction, rng: Rng): GameState {
  if (!isPlaying(state)) return state;
  const { player } = state;
  if (player.mana < DASH_MANA_COST || player.dashCooldown > 0) return state;

  const draft = openWorkingCopy(state);
  let position = player.position;
  let tiles = 0;

  for (let i = 0; i < DASH_DISTANCE; i++) {
    const next = stepCoord(position, direction);
    if (blocksPlayer(tileAt(draft.grid, next))) break;
    position = next;
    tiles += 1;
    pickUpAt(draft, position);
  }

  draft.player = updatePlayer(spendMana(draft.player, DASH_MANA_COST), { position, facing: direction, dashCooldown: DASH_COOLDOWN_TURNS });
  draft.events.push({ type: "dash", from: player.position, to: position, tiles });

  return resolveTurn(draft, rng);
}

/* ───────── Inventario / descanso ───────── */

export function useItem(state: GameState, itemId: string, rng: Rng): GameState {
  if (!isPlaying(state)) return state;
  const item: Item | undefined = state.player.inventory.find((i) => i.id === itemId);
  if (!item) return state;

  const draft = openWorkingCopy(state);
  const rest = state.player.inventory.filter((i) => i.id !== itemId);
  const base = updatePlayer(draft.player, { inventory: rest });
  const applied = item.type === "healthPotion" ? healPlayer(base, POTION_RESTORE_AMOUNT) : restoreMana(base, POTION_RESTORE_AMOUNT);

  draft.player = applied.player;
  draft.events.push({ type: "item_used", item, restored: applied.restored });

  return resolveTurn(draft, rng);
}

/** focus y wait son equivalentes: pasan el turno con regen de maná aumentada. */
export function focus(state: GameState, rng: Rng): GameState {
  if (!isPlaying(state)) return state;
  return resolveTurn(openWorkingCopy(state), rng, { focused: true });
}

export const wait = focus;

/* ───────── Hechizos ───────── */

/** Casillas que tocaría el hechizo activo sobre `target` (preview; no mira el estado del turno). */
export function affectedTiles(state: GameState, target?: Coord | null): CoordSet {
  const { player } = state;
  return affectedTilesFor({
    shape: player.selectedShape,
    target,
    caster: player.position,
    facing: player.facing,
    gridSize: state.gridSize,
  });
}

function isOccupied(state: GameState, at: Coord): boolean {
  return sameCoord(state.player.position, at) || state.enemies.some((e) => sameCoord(e.position, at)) || state.minions.some((m) => sameCoord(m.position, at));
}

export function castSpellAt(state: GameState, x: number, y: number, rng: Rng): GameState {
  if (!isPlaying(state)) return state;

  const { player } = state;
  const shape = player.selectedShape;
  const element = player.selectedElement;
  const cost = SHAPE_MANA_COST[shape];
  if (player.mana < cost) return state;

  const target: Coord = { x, y };

  // self: no apunta a ninguna casilla
  if (shape === "self") {
    const draft = openWorkingCopy(state);
    const healed = healPlayer(spendMana(draft.player, cost), SELF_HEAL_AMOUNT);
    draft.player = healed.player;
    draft.events.push({ type: "spell_cast", element, shape, target: null, manaSpent: cost });
    draft.events.push({ type: "self_heal", amount: healed.restored, healthAfter: healed.player.health });
    return resolveTurn(draft, rng);
  }

  if (!inBounds(target, state.gridSize)) return state;

  if (shape === "summon") {
    if (tileAt(state.grid, target) !== "empty" || isOccupied(state, target)) return state;
    const draft = openWorkingCopy(state);
    const minion = createMinion(takeId(draft, "minion"), target);
    draft.player = spendMana(draft.player, cost);
    draft.minions.push(minion);
    draft.events.push({ type: "spell_cast", element, shape, target, manaSpent: cost });
    draft.events.push({ type: "minion_summoned", minionId: minion.id, at: target });
    return resolveTurn(draft, rng);
  }

  if (shape === "raiseDead") {
    const corpse = state.corpsesOnGrid.get(target);
    // enemigos y minions pueden pisar cadáveres: no se levanta nada debajo de alguien
    if (!corpse || isOccupied(state, target)) return state;
    const draft = openWorkingCopy(state);
    draft.corpsesOnGrid.delete(target);
    setTile(draft.grid, target, staticTileAt(STATIC_TERRAIN, target));
    const minion = createMinion(takeId(draft, "minion"), target, corpse.type);
    draft.player = spendMana(draft.player, cost);
    draft.minions.push(minion);
    draft.events.push({ type: "spell_cast", element, shape, target, manaSpent: cost });
    draft.events.push({ type: "minion_summoned", minionId: minion.id, at: target, sourceType: corpse.type });
    return resolveTurn(draft, rng);
  }

  // AOE elemental: consume maná y turno aunque no golpee a nadie
  const tiles = affectedTiles(state, target);
  const draft = openWorkingCopy(state);
  draft.player = spendMana(draft.player, cost);
  draft.events.push({ type: "spell_cast", element, shape, target, manaSpent: cost });

  const res = resolveElementalSpell({
    enemies: draft.enemies,
    tiles,
    element,
    caster: player,
    grid: draft.grid,
    blockers: draft.minions.map((m) => m.position),
  });
  draft.enemies = res.enemies;
  draft.events.push(...res.events);

  if (element === "fire" && shape === "wall") {
    for (const at of tiles) {
      const effect = freshTerrainEffect("burning");
      draft.terrainEffects.set(at, effect);
      draft.events.push({ type: "terrain_ignited", at, duration: effect.duration });
    }
  }

  return resolveTurn(draft, rng, { defeated: res.defeated });
}

/* ───────── Loadout (sin turno) ───────── */

export function selectElement(state: GameState, element: SpellElement): GameState {
  if (!isPlaying(state) || !state.player.unlockedElements.has(element)) return state;
  if (state.player.selectedElement === element) return state;
  return { ...state, player: updatePlayer(state.player, { selectedElement: element }), events: [] };
}

export function selectSpellShape(state: GameState, shape: SpellShape): GameState {
  if (!isPlaying(state) || !state.player.unlockedSpellShapes.has(shape)) return state;
  if (state.player.selectedShape === shape) return state;
  return { ...state, player: updatePlayer(state.player, { selectedShape: shape }), events: [] };
}

export function restart(): GameState {
  return createInitialState();
}

/* ───────── Dispatcher ───────── */

export function applyAction(state: GameState, action: PlayerAction, rng: Rng): GameState {
  switch (action.type) {
    case "move":
      return move(state, action.direction, rng);
    case "dash":
      return dash(state, action.direction, rng);
    case "useItem":
      return useItem(state, action.itemId, rng);
    case "focus":
      return focus(state, rng);
    case "wait":
      return wait(state, rng);
    case "castSpellAt":
      return castSpellAt(state, action.x, action.y, rng);
    case "selectElement":
      return selectElement(state, action.element);
    case "selectSpellShape":
      return selectSpellShape(state, action.shape);
    case "restart":
      return restart();
  }
}
