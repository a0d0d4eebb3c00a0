import { SEGMENTS, segmentBit, type Segment } from "./segment";

/**
 * Ensemble des segments allumés pour une position, sous forme de masque 8 bits (0..255).
 * Valeur immuable: égalité et hachage structurels (c'est un nombre), utilisable comme clé de Map.
 */
export type DisplayState = number;

export const FULL_MASK = 0xff;

/** Ramène n'importe quel entier dans l'espace des 256 états. */
export function toDisplayState(mask: number): DisplayState {
  return Math.trunc(mask) & FULL_MASK;
}

/** Afficheur vide (aucun segment). */
export function emptyState(): DisplayState {
  return 0;
}

export function singleton(segment: Segment): DisplayState {
  return segmentBit(segment);
}

export function union(a: DisplayState, b: DisplayState): DisplayState {
  return (a | b) & FULL_MASK;
}

export function intersection(a: DisplayState, b: DisplayState): DisplayState {
  return a & b & FULL_MASK;
}

export function contains(state: DisplayState, segment: Segment): boolean {
  return (state & segmentBit(segment)) !== 0;
}

export function fromSegments(segments: Iterable<Segment>): DisplayState {
  let mask = 0;
  for (const s of segments) mask |= segmentBit(s);
  return mask;
}

/** Segments allumés, par ordre croissant de bit. */
export function segmentsOf(state: DisplayState): Segment[] {
  return SEGMENTS.filter((s) => contains(state, s));
}

export function hasPeriod(state: DisplayState): boolean {
  return contains(state, "period");
}

/**
 * Copie de l'état avec ou sans point décimal.
 * `withPeriod(s, false)` retire le bit du point (les autres bits sont conservés).
 */
export function withPeriod(state: DisplayState, on: boolean = true): DisplayState {
  const bit = segmentBit("period");
  return on ? union(state, bit) : toDisplayState(state & ~bit);
}
