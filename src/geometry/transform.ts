import type { AffineMatrix, Point } from "./types";

export const IDENTITY: AffineMatrix = [1, 0, 0, 1, 0, 0];

export function translate(dx: number, dy: number): AffineMatrix {
  return [1, 0, 0, 1, dx, dy];
}

/**
 * Cisaillement horizontal (x, y) → (x + factor·(y - anchorY), y).
 * Avec anchorY = 0 on retrouve la forme brute x + factor·y.
 */
export function shearX(factor: number, anchorY: number = 0): AffineMatrix {
  return [1, 0, factor, 1, 0 - factor * anchorY, 0];
}

/** Produit m1·m2 (m2 appliquée en premier). */
export function multiply(m1: AffineMatrix, m2: AffineMatrix): AffineMatrix {
  const [a1, b1, c1, d1, e1, f1] = m1;
  const [a2, b2, c2, d2, e2, f2] = m2;
  return [
    a1 * a2 + c1 * b2,
    b1 * a2 + d1 * b2,
    a1 * c2 + c1 * d2,
    b1 * c2 + d1 * d2,
    a1 * e2 + c1 * f2 + e1,
    b1 * e2 + d1 * f2 + f1,
  ];
}

export function transformPoint(m: AffineMatrix, p: Point): Point {
  const [a, b, c, d, e, f] = m;
  return { x: a * p.x + c * p.y + e, y: b * p.x + d * p.y + f };
}

export function isIdentity(m: AffineMatrix): boolean {
  return m.every((v, i) => v === IDENTITY[i]);
}
