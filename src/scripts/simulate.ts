// src/scripts/simulate.ts
// Uso: npm run simulate -- --seed=7 --actions="cast:5,5;move:down;focus" [--json]
/* eslint-disable no-console */
import "dotenv/config";
import { GameEngine } from "../battleSystem/core/GameEngine";
import type { GameState } from "../battleSystem/core/CombatTypes";
import { readDefaultSeed } from "../config/game";
import { parseActionScript } from "../utils/actionScript";
import { computeProgression } from "../services/progression.service";

// ---- helpers CLI/env --------------------------------------------------------
function getArg(name: string) {
  const pref = `--${name}=`;
  const hit = process.argv.find((a) => a.startsWith(pref));
  return hit ? hit.slice(pref.length) : undefined;
}
const WANT_JSON = process.argv.includes("--json");

function parseSeed(raw: string | undefined): number | string {
  if (raw === undefined || raw.trim() === "") return readDefaultSeed();
  const n = Number(raw);
  return Number.isInteger(n) ? n : raw;
}

// ---- pretty print -----------------------------------------------------------
function summarize(state: GameState) {
  const p = state.player;
  return {
    wave: state.wave,
    turn: state.turn,
    status: state.status,
    player: {
      position: `${p.position.x},${p.position.y}`,
      health: `${p.health}/${p.maxHealth}`,
      mana: `${p.mana}/${p.maxMana}`,
      progression: computeProgression(p),
      spellPower: p.spellPower,
      loadout: `${p.selectedElement}/${p.selectedShape}`,
      inventory: p.inventory.map((i) => i.id),
    },
    enemies: state.enemies.map((e) => ({ id: e.id, at: `${e.position.x},${e.position.y}`, health: e.health, statuses: e.statusEffects.map((s) => `${s.type}:${s.duration}`) })),
    minions: state.minions.map((m) => ({ id: m.id, at: `${m.position.x},${m.position.y}`, health: m.health })),
  };
}

/** Snapshot serializable: Sets → arrays, mapas por coordenada → listas de [x,y,valor]. */
function toJSON(state: GameState) {
  return {
    ...state,
    player: { ...state.player, unlockedElements: [...state.player.unlockedElements], unlockedSpellShapes: [...state.player.unlockedSpellShapes] },
    itemsOnGrid: state.itemsOnGrid.entries().map(([c, v]) => ({ ...c, ...v })),
    corpsesOnGrid: state.corpsesOnGrid.values(),
    terrainEffects: state.terrainEffects.entries().map(([c, v]) => ({ ...c, ...v })),
  };
}

function main(): number {
  try {
    const seed = parseSeed(getArg("seed"));
    const actions = parseActionScript(getArg("actions") ?? "");
    const engine = new GameEngine({ seed });

    for (const action of actions) engine.dispatch(action);

    if (WANT_JSON) console.log(JSON.stringify(toJSON(engine.state), null, 2));
    else {
      console.log(`🎲 seed=${seed} · ${actions.length} acciones`);
      console.dir(summarize(engine.state), { depth: null });
    }
    return 0;
  } catch (err) {
    console.error("❌ simulate:", err instanceof Error ? err.message : err);
    return 1;
  }
}

process.exit(main());
