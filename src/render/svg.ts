import type { AffineMatrix, SegmentShape } from "../geometry/types";
import { isIdentity } from "../geometry/transform";
import { placedTransform, type DisplayRendering } from "./display";
import type { ReadoutRendering } from "./readout";

export interface SvgOptions {
  /** Couleur de fond (aucun fond si absent). */
  background?: string;
  /** Ne pas dessiner les segments éteints. */
  hideUnlit?: boolean;
}

function num(n: number): string {
  const r = Math.round(n * 1000) / 1000;
  return Object.is(r, -0) ? "0" : String(r);
}

export function escapeAttr(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function matrixAttr(m: AffineMatrix): string {
  return `matrix(${m.map(num).join(" ")})`;
}

export function shapeToSvg(shape: SegmentShape, fill: string): string {
  const f = escapeAttr(fill);
  if (shape.type === "ellipse") {
    return `<ellipse cx="${num(shape.cx)}" cy="${num(shape.cy)}" rx="${num(shape.rx)}" ry="${num(shape.ry)}" fill="${f}"/>`;
  }
  const points = shape.points.map((p) => `${num(p.x)},${num(p.y)}`).join(" ");
  return `<polygon points="${points}" fill="${f}"/>`;
}

function displayGroup(rendering: DisplayRendering<string>, transform: AffineMatrix, opts: SvgOptions, label?: string): string[] {
  const attrs: string[] = [];
  if (!isIdentity(transform)) attrs.push(`transform="${matrixAttr(transform)}"`);
  if (label !== undefined) attrs.push(`data-char="${escapeAttr(label)}"`);
  const open = attrs.length > 0 ? `<g ${attrs.join(" ")}>` : "<g>";
  const body = rendering.segments
    .filter((s) => s.lit || !opts.hideUnlit)
    .map((s) => `    ${shapeToSvg(s.shape, s.fill)}`);
  return [`  ${open}`, ...body, "  </g>"];
}

function svgDocument(width: number, height: number, groups: string[][], opts: SvgOptions): string {
  const lines = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${num(width)}" height="${num(height)}" viewBox="0 0 ${num(width)} ${num(height)}">`,
  ];
  if (opts.background) {
    lines.push(`  <rect width="${num(width)}" height="${num(height)}" fill="${escapeAttr(opts.background)}"/>`);
  }
  for (const g of groups) lines.push(...g);
  lines.push("</svg>");
  return lines.join("\n") + "\n";
}

/** Peint un afficheur seul en document SVG. */
export function displayToSvg(rendering: DisplayRendering<string>, opts: SvgOptions = {}): string {
  const group = displayGroup(rendering, rendering.transform, opts);
  return svgDocument(rendering.size.width, rendering.size.height, [group], opts);
}

/** Peint un affichage multi-caractères en document SVG (un groupe par caractère). */
export function readoutToSvg(readout: ReadoutRendering<string>, opts: SvgOptions = {}): string {
  const groups = readout.displays.map((d) =>
    displayGroup(d.rendering, placedTransform(d.rendering, d.cell.frame.x, d.cell.frame.y), opts, d.cell.character)
  );
  return svgDocument(readout.size.width, readout.size.height, groups, opts);
}
