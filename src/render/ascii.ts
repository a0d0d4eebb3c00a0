import { contains, type DisplayState } from "../segments/displayState";
import type { Segment } from "../segments/segment";

/**
 * Aperçu texte d'un état sur trois lignes (« _ », « | », « . »), quatre colonnes par caractère.
 */
export function asciiCell(state: DisplayState): [string, string, string] {
  const on = (seg: Segment, ch: string): string => (contains(state, seg) ? ch : " ");
  return [
    ` ${on("top", "_")}  `,
    `${on("topLeft", "|")}${on("center", "_")}${on("topRight", "|")} `,
    `${on("bottomLeft", "|")}${on("bottom", "_")}${on("bottomRight", "|")}${on("period", ".")}`,
  ];
}

/** Aperçu de plusieurs états côte à côte; les espaces de fin de ligne sont retirés. */
export function asciiReadout(states: readonly DisplayState[]): string {
  const rows = ["", "", ""];
  for (const state of states) {
    const cell = asciiCell(state);
    for (let i = 0; i < 3; i += 1) rows[i] += cell[i];
  }
  return rows.map((r) => r.trimEnd()).join("\n");
}
