/** Inclinaison de l'afficheur: aucune, ou cisaillement horizontal de facteur `factor`. */
export type Skew = { kind: "none" } | { kind: "custom"; factor: number };

export const NO_SKEW: Skew = { kind: "none" };

/** Inclinaison « traditionnelle » des afficheurs LED. */
export const TRADITIONAL_SKEW: Skew = { kind: "custom", factor: -0.1 };

export function customSkew(factor: number): Skew {
  return factor === 0 ? NO_SKEW : { kind: "custom", factor };
}

export function shearFactor(skew: Skew): number {
  return skew.kind === "none" ? 0 : skew.factor;
}

/** Marge horizontale ajoutée de chaque côté pour que l'afficheur incliné ne déborde pas. */
export function skewPadding(skew: Skew, frameWidth: number): number {
  return Math.abs(shearFactor(skew)) * frameWidth;
}

/**
 * Interprète une valeur de configuration: "none", "traditional" ou un facteur numérique.
 * @throws Error si la valeur n'est pas reconnue
 */
export function skewFromValue(value: string | number): Skew {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new Error(`Inclinaison invalide: ${value}`);
    return customSkew(value);
  }
  const v = value.trim().toLowerCase();
  if (v === "none" || v === "") return NO_SKEW;
  if (v === "traditional") return TRADITIONAL_SKEW;
  const n = Number(v);
  if (Number.isFinite(n)) return customSkew(n);
  throw new Error(`Inclinaison invalide: '${value}' (attendu none | traditional | nombre)`);
}

export function describeSkew(skew: Skew): string {
  if (skew.kind === "none") return "none";
  return skew.factor === shearFactor(TRADITIONAL_SKEW) ? "traditional" : String(skew.factor);
}
