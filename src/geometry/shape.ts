import type { Segment, SegmentKind } from "../segments/segment";
import { segmentKind } from "../segments/segment";
import { frameFor } from "./frame";
import { rect, type Point, type Rect, type SegmentShape, type Size } from "./types";

/**
 * Barre horizontale effilée: rectangle dont chaque extrémité se termine en pointe
 * sur l'axe médian, les pointes entamant la barre d'une demi-épaisseur.
 */
function horizontalBar(r: Rect): Point[] {
  const inset = Math.min(r.width, r.height) / 2;
  const minX = r.x;
  const maxX = r.x + r.width;
  const minY = r.y;
  const maxY = r.y + r.height;
  const midY = r.y + r.height / 2;
  return [
    { x: maxX, y: midY },
    { x: maxX - inset, y: maxY },
    { x: minX + inset, y: maxY },
    { x: minX, y: midY },
    { x: minX + inset, y: minY },
    { x: maxX - inset, y: minY },
  ];
}

function verticalBar(r: Rect): Point[] {
  const inset = Math.min(r.width, r.height) / 2;
  const minX = r.x;
  const maxX = r.x + r.width;
  const minY = r.y;
  const maxY = r.y + r.height;
  const midX = r.x + r.width / 2;
  return [
    { x: midX, y: maxY },
    { x: maxX, y: maxY - inset },
    { x: maxX, y: minY + inset },
    { x: midX, y: minY },
    { x: minX, y: minY + inset },
    { x: minX, y: maxY - inset },
  ];
}

/** Contour d'un segment de la forme donnée, inscrit dans `r`. */
export function shapeFor(kind: SegmentKind, r: Rect): SegmentShape {
  switch (kind) {
    case "horizontal":
      return { type: "polygon", points: horizontalBar(r) };
    case "vertical":
      return { type: "polygon", points: verticalBar(r) };
    case "dot":
      return {
        type: "ellipse",
        cx: r.x + r.width / 2,
        cy: r.y + r.height / 2,
        rx: r.width / 2,
        ry: r.height / 2,
      };
  }
}

export interface SegmentGeometry {
  segment: Segment;
  kind: SegmentKind;
  origin: Point;
  size: Size;
  shape: SegmentShape;
}

/** Sous-cadre et contour d'un segment pour un afficheur de taille `parent`. */
export function geometry(segment: Segment, parent: Size): SegmentGeometry {
  const kind = segmentKind(segment);
  const { origin, size } = frameFor(segment, parent);
  return { segment, kind, origin, size, shape: shapeFor(kind, rect(origin, size)) };
}
