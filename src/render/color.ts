/**
 * Ce dont le cœur a besoin d'une couleur hôte: en dériver une variante à opacité réduite.
 * La représentation elle-même reste opaque.
 */
export interface ColorModel<C> {
  withOpacity(color: C, opacity: number): C;
}

/** Opacité des segments éteints. */
export const DIM_OPACITY = 0.1;

function clamp01(v: number): number {
  if (!Number.isFinite(v)) return 1;
  return Math.max(0, Math.min(1, v));
}

function fmt(n: number): string {
  return String(Math.round(n * 1000) / 1000);
}

function parseHex(color: string): [number, number, number, number] | null {
  const m = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i.exec(color.trim());
  if (!m) return null;
  let hex = m[1];
  if (hex.length === 3) hex = hex.split("").map((c) => c + c).join("");
  const r = parseInt(hex.slice(0, 2), 16);
  const g = parseInt(hex.slice(2, 4), 16);
  const b = parseInt(hex.slice(4, 6), 16);
  const a = hex.length === 8 ? parseInt(hex.slice(6, 8), 16) / 255 : 1;
  return [r, g, b, a];
}

function parseRgb(color: string): [number, number, number, number] | null {
  const m = /^rgba?\(\s*([\d.]+)\s*[,\s]\s*([\d.]+)\s*[,\s]\s*([\d.]+)\s*(?:[,/]\s*([\d.]+%?)\s*)?\)$/i.exec(color.trim());
  if (!m) return null;
  let a = 1;
  if (m[4] !== undefined) {
    a = m[4].endsWith("%") ? Number(m[4].slice(0, -1)) / 100 : Number(m[4]);
  }
  return [Number(m[1]), Number(m[2]), Number(m[3]), a];
}

/**
 * Modèle de couleur CSS (chaînes): `#rgb`, `#rrggbb`, `#rrggbbaa` et `rgb()/rgba()` sont
 * réécrits en `rgba(...)`; toute autre couleur (nom, hsl…) passe par `color-mix`.
 */
export const cssColorModel: ColorModel<string> = {
  withOpacity(color: string, opacity: number): string {
    const o = clamp01(opacity);
    const rgba = parseHex(color) ?? parseRgb(color);
    if (rgba) {
      const [r, g, b, a] = rgba;
      return `rgba(${r}, ${g}, ${b}, ${fmt(a * o)})`;
    }
    return `color-mix(in srgb, ${color.trim()} ${fmt(o * 100)}%, transparent)`;
  },
};
