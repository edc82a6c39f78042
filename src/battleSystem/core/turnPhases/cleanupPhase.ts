// src/battleSystem/core/turnPhases/cleanupPhase.ts
import { FOCUS_MANA_REGEN, MANA_REGEN_PER_TURN } from "../CombatConfig";
import { restoreMana, updatePlayer } from "../../entities/Player";
import type { TurnContext } from "./context";

/** Fase 6: game over, regen de maná (clamp), cooldown de dash y contador de turnos. */
export function runCleanupPhase(ctx: TurnContext): void {
  const { draft } = ctx;

  if (draft.player.health <= 0 && draft.status === "playing") {
    draft.status = "gameOver";
    draft.events.push({ type: "game_over" });
  }

  const { player } = restoreMana(draft.player, ctx.focused ? FOCUS_MANA_REGEN : MANA_REGEN_PER_TURN);
  draft.player = player.dashCooldown > 0 ? updatePlayer(player, { dashCooldown: player.dashCooldown - 1 }) : player;

  draft.turn += 1;
}
