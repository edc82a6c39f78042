// src/battleSystem/core/GameEngine.ts
/* eslint-disable no-console */
import type { SpellElement, SpellShape } from "../constants/spells";
import type { GameState, PlayerAction } from "./CombatTypes";
import type { Coord, CoordSet, Direction } from "./Coord";
import type { Rng } from "./RngSeed";
import { seededRng } from "./RngSeed";
import { affectedTiles, applyAction } from "./PlayerActions";
import { createInitialState } from "../../services/wave.service";
import { TURN_DEBUG } from "../../config/game";

export type GameEngineOptions = {
  /** RNG ya construido (tests). Tiene prioridad sobre `seed`. */
  rng?: Rng;
  /** Seed numérica o string; sin seed ⇒ Math.random */
  seed?: number | string;
  /** Estado de arranque; por defecto la oleada 1 */
  initialState?: GameState;
};

function rngFor(opts: GameEngineOptions): Rng {
  if (opts.rng) return opts.rng;
  if (opts.seed !== undefined) return seededRng(opts.seed);
  return Math.random;
}

/**
 * Dueño único del snapshot autoritativo entre llamadas.
 * Cada método aplica una acción y devuelve el snapshot nuevo (o el mismo si fue no-op).
 */
export class GameEngine {
  private current: GameState;
  private readonly rng: Rng;

  constructor(opts: GameEngineOptions = {}) {
    this.rng = rngFor(opts);
    this.current = opts.initialState ?? createInitialState();
  }

  get state(): GameState {
    return this.current;
  }

  dispatch(action: PlayerAction): GameState {
    const next = applyAction(this.current, action, this.rng);
    if (TURN_DEBUG && next !== this.current) console.log("[TURN] acción", action.type, "→ turno", next.turn, next.status);
    this.current = next;
    return next;
  }

  move(direction: Direction): GameState {
    return this.dispatch({ type: "move", direction });
  }

  dash(direction: Direction): GameState {
    return this.dispatch({ type: "dash", direction });
  }

  useItem(itemId: string): GameState {
    return this.dispatch({ type: "useItem", itemId });
  }

  focus(): GameState {
    return this.dispatch({ type: "focus" });
  }

  wait(): GameState {
    return this.dispatch({ type: "wait" });
  }

  castSpellAt(x: number, y: number): GameState {
    return this.dispatch({ type: "castSpellAt", x, y });
  }

  selectElement(element: SpellElement): GameState {
    return this.dispatch({ type: "selectElement", element });
  }

  selectSpellShape(shape: SpellShape): GameState {
    return this.dispatch({ type: "selectSpellShape", shape });
  }

  restart(): GameState {
    return this.dispatch({ type: "restart" });
  }

  /** Preview de solo lectura con el loadout actual. */
  affectedTiles(target?: Coord | null): CoordSet {
    return affectedTiles(this.current, target);
  }
}
