export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Rectangle aligné sur les axes (origine en haut à gauche). */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Contour fermé d'un segment: hexagone (barres) ou ellipse inscrite (point). */
export type SegmentShape =
  | { type: "polygon"; points: Point[] }
  | { type: "ellipse"; cx: number; cy: number; rx: number; ry: number };

/** Matrice affine [a, b, c, d, e, f]: x' = a·x + c·y + e, y' = b·x + d·y + f. */
export type AffineMatrix = readonly [number, number, number, number, number, number];

export function rect(origin: Point, size: Size): Rect {
  return { x: origin.x, y: origin.y, width: size.width, height: size.height };
}

export function offsetRect(r: Rect, dx: number, dy: number): Rect {
  return { ...r, x: r.x + dx, y: r.y + dy };
}
