/**
 * Les huit éléments d'un afficheur 7-segments (sept barres + point décimal),
 * dans l'ordre croissant de leur bit.
 */
export const SEGMENTS = [
  "top",
  "topRight",
  "bottomRight",
  "bottom",
  "bottomLeft",
  "topLeft",
  "center",
  "period",
] as const;

export type Segment = (typeof SEGMENTS)[number];

/** Forme d'un segment: barre horizontale, barre verticale ou point. */
export type SegmentKind = "horizontal" | "vertical" | "dot";

export const SEGMENT_BITS: Readonly<Record<Segment, number>> = {
  top: 0x01,
  topRight: 0x02,
  bottomRight: 0x04,
  bottom: 0x08,
  bottomLeft: 0x10,
  topLeft: 0x20,
  center: 0x40,
  period: 0x80,
};

export function segmentBit(segment: Segment): number {
  return SEGMENT_BITS[segment];
}

export function segmentKind(segment: Segment): SegmentKind {
  switch (segment) {
    case "top":
    case "center":
    case "bottom":
      return "horizontal";
    case "topRight":
    case "bottomRight":
    case "bottomLeft":
    case "topLeft":
      return "vertical";
    case "period":
      return "dot";
  }
}

export function isSegment(value: unknown): value is Segment {
  return typeof value === "string" && (SEGMENTS as readonly string[]).includes(value);
}
