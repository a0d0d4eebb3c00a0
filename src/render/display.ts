import { SEGMENTS, segmentKind, type Segment, type SegmentKind } from "../segments/segment";
import { contains, type DisplayState } from "../segments/displayState";
import { frameFor } from "../geometry/frame";
import { shapeFor } from "../geometry/shape";
import { IDENTITY, multiply, shearX, translate } from "../geometry/transform";
import { offsetRect, rect, type AffineMatrix, type Rect, type SegmentShape, type Size } from "../geometry/types";
import { cssColorModel, DIM_OPACITY, type ColorModel } from "./color";
import { NO_SKEW, shearFactor, skewPadding, type Skew } from "./skew";

export interface RenderedSegment<C> {
  segment: Segment;
  kind: SegmentKind;
  lit: boolean;
  /** Sous-cadre du segment, dans le repère de l'afficheur (avant cisaillement). */
  frame: Rect;
  shape: SegmentShape;
  fill: C;
}

export interface DisplayRendering<C> {
  size: Size;
  /** Marge horizontale de chaque côté réservée au cisaillement. */
  padding: number;
  /** Transformation à appliquer à toutes les formes (identité sans inclinaison). */
  transform: AffineMatrix;
  segments: RenderedSegment<C>[];
}

export interface DisplayOptions<C> {
  state: DisplayState;
  color: C;
  size: Size;
  skew?: Skew;
  colorModel: ColorModel<C>;
  /** Opacité des segments éteints (défaut 0.1). */
  dimOpacity?: number;
}

/**
 * Compose les huit segments d'un afficheur: sous-cadre, contour et couleur de chacun,
 * plus le cisaillement éventuel de l'ensemble.
 * Le cisaillement est ancré sur le milieu vertical du cadre: x' = x + c·(y − H/2),
 * et non sur l'origine.
 */
export function renderDisplay<C>(opts: DisplayOptions<C>): DisplayRendering<C> {
  const skew = opts.skew ?? NO_SKEW;
  const c = shearFactor(skew);
  const padding = skewPadding(skew, opts.size.width);
  const inner: Size = { width: Math.max(0, opts.size.width - 2 * padding), height: opts.size.height };
  const dimmed = opts.colorModel.withOpacity(opts.color, opts.dimOpacity ?? DIM_OPACITY);

  const segments = SEGMENTS.map((segment): RenderedSegment<C> => {
    const kind = segmentKind(segment);
    const { origin, size } = frameFor(segment, inner);
    const frame = offsetRect(rect(origin, size), padding, 0);
    const lit = contains(opts.state, segment);
    return { segment, kind, lit, frame, shape: shapeFor(kind, frame), fill: lit ? opts.color : dimmed };
  });

  const transform = c === 0 ? IDENTITY : shearX(c, opts.size.height / 2);
  return { size: { ...opts.size }, padding, transform, segments };
}

/** Variante pour les couleurs CSS. */
export function renderCssDisplay(
  state: DisplayState,
  color: string,
  size: Size,
  skew: Skew = NO_SKEW
): DisplayRendering<string> {
  return renderDisplay({ state, color, size, skew, colorModel: cssColorModel });
}

/** Transformation complète d'un afficheur placé à `origin` dans un repère parent. */
export function placedTransform(rendering: DisplayRendering<unknown>, x: number, y: number): AffineMatrix {
  return multiply(translate(x, y), rendering.transform);
}
