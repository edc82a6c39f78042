// src/utils/actionScript.ts
// Parser del mini-lenguaje de acciones del CLI: "cast:5,5;move:down;focus".
import type { PlayerAction } from "../battleSystem/core/CombatTypes";
import { isDirection } from "../battleSystem/core/Coord";
import { isSpellElement, isSpellShape } from "../battleSystem/constants/spells";

const toInt = (raw: string): number | null => (/^-?\d+$/.test(raw.trim()) ? parseInt(raw.trim(), 10) : null);

/** Un token → una acción. Tokens mal formados lanzan Error (error de programador, no de reglas). */
export function parseActionToken(token: string): PlayerAction {
  const trimmed = token.trim();
  const sep = trimmed.indexOf(":");
  const verb = (sep >= 0 ? trimmed.slice(0, sep) : trimmed).toLowerCase();
  const arg = sep >= 0 ? trimmed.slice(sep + 1).trim() : "";

  switch (verb) {
    case "move":
    case "dash":
      if (!isDirection(arg)) throw new Error(`Dirección inválida en "${trimmed}" (up|down|left|right)`);
      return verb === "move" ? { type: "move", direction: arg } : { type: "dash", direction: arg };
    case "use":
      if (!arg) throw new Error(`Falta el id del item en "${trimmed}"`);
      return { type: "useItem", itemId: arg };
    case "focus":
      return { type: "focus" };
    case "wait":
      return { type: "wait" };
    case "restart":
      return { type: "restart" };
    case "cast": {
      const [xs = "", ys = "", ...extra] = arg.split(",");
      const x = toInt(xs);
      const y = toInt(ys);
      if (x === null || y === null || extra.length) throw new Error(`Coordenadas inválidas en "${trimmed}" (cast:<x>,<y>)`);
      return { type: "castSpellAt", x, y };
    }
    case "element":
      if (!isSpellElement(arg)) throw new Error(`Elemento desconocido en "${trimmed}"`);
      return { type: "selectElement", element: arg };
    case "shape":
      if (!isSpellShape(arg)) throw new Error(`Forma desconocida en "${trimmed}"`);
      return { type: "selectSpellShape", shape: arg };
    default:
      throw new Error(`Acción desconocida: "${trimmed}"`);
  }
}

/** Script separado por `;`. Tokens vacíos se ignoran. */
export function parseActionScript(script: string): PlayerAction[] {
  return script
    .split(";")
    .map((t) => t.trim())
    .filter(Boolean)
    .map(parseActionToken);
}
