import { emptyState, withPeriod, type DisplayState } from "../segments/displayState";
import { encode } from "../segments/encoding";
import type { Rect, Size } from "../geometry/types";
import type { ColorModel } from "./color";
import { renderDisplay, type DisplayRendering } from "./display";
import { NO_SKEW, type Skew } from "./skew";

/** Rapport largeur/hauteur d'un caractère (9:16). */
export const DEFAULT_CHARACTER_ASPECT_RATIO = 9 / 16;

/** Taille par défaut d'un caractère, en unités hôte. */
export const DEFAULT_CHARACTER_SIZE: Size = { width: 36, height: 64 };

export interface ReadoutCell {
  character: string;
  frame: Rect;
  state: DisplayState;
}

/** Un état par caractère (point de code); les caractères non représentables restent vides. */
export function readoutStates(text: string, allowCaseToggle: boolean = true): DisplayState[] {
  return Array.from(text).map((ch) => encode(ch, allowCaseToggle) ?? emptyState());
}

/**
 * Espacement entre deux afficheurs: 5 % de la largeur totale réparti sur les N-1 intervalles.
 */
export function readoutSpacing(totalWidth: number, count: number): number {
  if (count <= 1) return 0;
  return totalWidth / 20 / Math.max(1, count - 1);
}

export function readoutAspectRatio(perCharacterAspectRatio: number, count: number): number {
  return count > 0 ? perCharacterAspectRatio * count : perCharacterAspectRatio;
}

/** Taille naturelle d'un affichage de `count` caractères de hauteur `height`. */
export function readoutSize(
  count: number,
  height: number = DEFAULT_CHARACTER_SIZE.height,
  perCharacterAspectRatio: number = DEFAULT_CHARACTER_ASPECT_RATIO
): Size {
  return { width: readoutAspectRatio(perCharacterAspectRatio, count) * height, height };
}

/**
 * Dispose les caractères de `text` de gauche à droite dans `size`.
 * Sans taille, la taille naturelle (9:16 par caractère) est utilisée.
 */
export function layoutReadout(text: string, size?: Size, allowCaseToggle: boolean = true): ReadoutCell[] {
  const characters = Array.from(text);
  const n = characters.length;
  if (n === 0) return [];
  const total = size ?? readoutSize(n);
  const spacing = readoutSpacing(total.width, n);
  const cellWidth = Math.max(0, (total.width - spacing * (n - 1)) / n);
  return characters.map((character, i) => ({
    character,
    frame: { x: i * (cellWidth + spacing), y: 0, width: cellWidth, height: total.height },
    state: encode(character, allowCaseToggle) ?? emptyState(),
  }));
}

export interface ReadoutOptions<C> {
  color: C;
  colorModel: ColorModel<C>;
  size?: Size;
  skew?: Skew;
  dimOpacity?: number;
  /** Réessayer avec la casse inversée si un caractère manque (défaut true). */
  allowCaseToggle?: boolean;
  /** Indices des caractères qui affichent leur point décimal. */
  periods?: ReadonlySet<number>;
}

export interface PlacedDisplay<C> {
  cell: ReadoutCell;
  rendering: DisplayRendering<C>;
}

export interface ReadoutRendering<C> {
  size: Size;
  displays: PlacedDisplay<C>[];
}

export function renderReadout<C>(text: string, opts: ReadoutOptions<C>): ReadoutRendering<C> {
  const cells = layoutReadout(text, opts.size, opts.allowCaseToggle ?? true);
  const size = opts.size ?? readoutSize(cells.length);
  const displays = cells.map((cell, i): PlacedDisplay<C> => {
    const state = opts.periods?.has(i) ? withPeriod(cell.state) : cell.state;
    return {
      cell: { ...cell, state },
      rendering: renderDisplay({
        state,
        color: opts.color,
        colorModel: opts.colorModel,
        size: { width: cell.frame.width, height: cell.frame.height },
        skew: opts.skew ?? NO_SKEW,
        dimOpacity: opts.dimOpacity,
      }),
    };
  });
  return { size, displays };
}
