import type { RenderOptions } from "../config";
import type { Size } from "../geometry/types";
import { cssColorModel } from "../render/color";
import { asciiReadout } from "../render/ascii";
import { withPeriod } from "../segments/displayState";
import { readoutStates, renderReadout, type ReadoutRendering } from "../render/readout";
import { readoutToSvg } from "../render/svg";

/** Taille totale d'un affichage de `count` caractères pour les options données. */
export function readoutFrameSize(count: number, options: RenderOptions): Size {
  return { width: options.charSize.width * Math.max(1, count), height: options.charSize.height };
}

export function renderText(text: string, options: RenderOptions, periods?: ReadonlySet<number>): ReadoutRendering<string> {
  const count = Array.from(text).length;
  return renderReadout(text, {
    color: options.color,
    colorModel: cssColorModel,
    size: readoutFrameSize(count, options),
    skew: options.skew,
    dimOpacity: options.dimOpacity,
    allowCaseToggle: options.allowCaseToggle,
    periods,
  });
}

export function renderTextToSvg(text: string, options: RenderOptions, periods?: ReadonlySet<number>): string {
  return readoutToSvg(renderText(text, options, periods), {
    background: options.background,
    hideUnlit: options.hideUnlit,
  });
}

export function renderTextToAscii(text: string, options: RenderOptions, periods?: ReadonlySet<number>): string {
  const states = readoutStates(text, options.allowCaseToggle);
  return asciiReadout(states.map((state, i) => (periods?.has(i) ? withPeriod(state) : state)));
}
