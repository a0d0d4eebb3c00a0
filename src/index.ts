import { emptyState, type DisplayState } from "./segments/displayState";
import { encode } from "./segments/encoding";

export * from "./segments/segment";
export * from "./segments/displayState";
export { encode, isRepresentable, encodableCharacters, toggleCase } from "./segments/encoding";
export * from "./geometry/types";
export * from "./geometry/transform";
export { thickness, frameFor, type SegmentFrame } from "./geometry/frame";
export { shapeFor, geometry, type SegmentGeometry } from "./geometry/shape";
export * from "./render/color";
export * from "./render/skew";
export * from "./render/display";
export * from "./render/readout";
export * from "./render/svg";
export { asciiCell, asciiReadout } from "./render/ascii";

/** Afficheur vide. */
export function blankDisplayState(): DisplayState {
  return emptyState();
}

/**
 * État qui ressemble au caractère donné, ou `null` s'il n'est pas représentable.
 */
export function displayState(resembling: string, allowCaseToggle: boolean = true): DisplayState | null {
  return encode(resembling, allowCaseToggle);
}
