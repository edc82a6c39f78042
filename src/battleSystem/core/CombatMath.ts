export const asInt = (n: number) => Math.trunc(Number(n) || 0);
export const clamp = (v: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, asInt(v)));

/** Aplica un porcentaje entero como multiplicador (125 ⇒ ×1.25). Sin redondeo. */
export const scalePct = (v: number, percent: number) => (v * percent) / 100;

export const sign = (n: number) => (n > 0 ? 1 : n < 0 ? -1 : 0);
