import { segmentKind, type Segment, type SegmentKind } from "../segments/segment";
import type { Point, Size } from "./types";

/** Épaisseur d'une barre: 10 % du plus petit côté, jamais moins d'une unité. */
export function thickness(parent: Size): number {
  return Math.max(1, Math.min(parent.width, parent.height) * 0.1);
}

function nominalSize(kind: SegmentKind, parent: Size): Size {
  const t = thickness(parent);
  switch (kind) {
    case "horizontal":
      return { width: Math.max(0, parent.width - 2.5 * t), height: t };
    case "vertical":
      return { width: t, height: Math.max(0, (parent.height - t) / 2) };
    case "dot":
      return { width: t, height: t };
  }
}

/**
 * Coin haut-gauche du sous-cadre d'un segment.
 * Les barres horizontales sont décalées d'une demi-épaisseur pour que leurs pointes
 * viennent se loger entre les barres verticales; le point occupe le coin bas-droit.
 */
function nominalOrigin(segment: Segment, parent: Size): Point {
  const t = thickness(parent);
  const { width: w, height: h } = parent;
  const right = Math.max(0, w - 2.5 * t);
  switch (segment) {
    case "top":
      return { x: t / 2, y: 0 };
    case "center":
      return { x: t / 2, y: h / 2 - t / 2 };
    case "bottom":
      return { x: t / 2, y: h - t };
    case "topLeft":
      return { x: 0, y: t / 2 };
    case "bottomLeft":
      return { x: 0, y: h / 2 };
    case "topRight":
      return { x: right, y: t / 2 };
    case "bottomRight":
      return { x: right, y: h / 2 };
    case "period":
      return { x: w - t, y: h - t };
  }
}

/** Intervalle [start, start + length] ramené dans [0, limit]. */
function clampSpan(start: number, length: number, limit: number): [number, number] {
  const max = Math.max(0, limit);
  const lo = Math.min(max, Math.max(0, start));
  const hi = Math.min(max, Math.max(0, start + length));
  return [lo, Math.max(0, hi - lo)];
}

export interface SegmentFrame {
  origin: Point;
  size: Size;
}

/**
 * Sous-cadre d'un segment, toujours contenu dans le cadre parent.
 * Pour un cadre trop petit (épaisseur minimale d'une unité), le sous-cadre est rogné,
 * jusqu'à une surface nulle pour un cadre vide.
 */
export function frameFor(segment: Segment, parent: Size): SegmentFrame {
  const origin = nominalOrigin(segment, parent);
  const size = nominalSize(segmentKind(segment), parent);
  const [x, width] = clampSpan(origin.x, size.width, parent.width);
  const [y, height] = clampSpan(origin.y, size.height, parent.height);
  return { origin: { x, y }, size: { width, height } };
}
