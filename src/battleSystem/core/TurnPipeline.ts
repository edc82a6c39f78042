// src/battleSystem/core/TurnPipeline.ts
/* eslint-disable no-console */
/**
 * Resolución de un turno completo, en orden fijo:
 *   terreno → estados → minions → enemigos → loot/XP → cierre → (commit) → chequeo de oleada
 * Todas las fases trabajan sobre la MISMA copia de trabajo; solo el commit es observable.
 */
import type { Enemy, GameState } from "./CombatTypes";
import type { Rng } from "./RngSeed";
import type { WorkingState } from "../snapshots/GameSnapshot";
import { commitSnapshot } from "../snapshots/GameSnapshot";
import type { TurnContext } from "./turnPhases/context";
import { runTerrainPhase } from "./turnPhases/terrainPhase";
import { runStatusPhase } from "./turnPhases/statusPhase";
import { runMinionPhase } from "./turnPhases/minionPhase";
import { runEnemyPhase } from "./turnPhases/enemyPhase";
import { runLootPhase } from "./turnPhases/lootPhase";
import { runCleanupPhase } from "./turnPhases/cleanupPhase";
import { advanceWave } from "../../services/wave.service";
import { TURN_DEBUG } from "../../config/game";

export type TurnOptions = {
  /** focus/wait ⇒ regen de maná aumentada */
  focused?: boolean;
  /** Enemigos que la acción del jugador ya mató (p. ej. un hechizo) */
  defeated?: readonly Enemy[];
};

const PHASES: ReadonlyArray<[string, (ctx: TurnContext) => void]> = [
  ["terrain", runTerrainPhase],
  ["status", runStatusPhase],
  ["minions", runMinionPhase],
  ["enemies", runEnemyPhase],
  ["loot", runLootPhase],
  ["cleanup", runCleanupPhase],
];

export function resolveTurn(draft: WorkingState, rng: Rng, opts: TurnOptions = {}): GameState {
  const ctx: TurnContext = { draft, rng, defeated: [...(opts.defeated ?? [])], focused: !!opts.focused };

  for (const [name, run] of PHASES) {
    run(ctx);
    if (TURN_DEBUG) console.log(`[TURN] ${draft.turn} ${name}`, { hp: draft.player.health, enemies: draft.enemies.length, defeated: ctx.defeated.length });
  }

  const committed = commitSnapshot(draft);
  if (committed.status === "playing" && committed.enemies.length === 0) return advanceWave(committed);
  return committed;
}
