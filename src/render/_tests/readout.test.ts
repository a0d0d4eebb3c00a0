import { describe, it, expect } from "vitest";
import { cssColorModel } from "../color";
import {
  layoutReadout,
  readoutAspectRatio,
  readoutSize,
  readoutSpacing,
  readoutStates,
  renderReadout,
} from "../readout";

describe("render/readout", () => {
  it("spreads 5% of the width over the gaps", () => {
    expect(readoutSpacing(200, 5)).toBe(2.5);
    expect(readoutSpacing(100, 2)).toBe(5);
    expect(readoutSpacing(200, 1)).toBe(0);
    expect(readoutSpacing(200, 0)).toBe(0);
  });

  it("derives the readout aspect ratio", () => {
    expect(readoutAspectRatio(0.5, 3)).toBe(1.5);
    expect(readoutAspectRatio(0.5, 0)).toBe(0.5);
  });

  it("substitutes blank states for unrepresentable characters", () => {
    expect(readoutStates("Hi!")).toEqual([0x76, 0x04, 0]);
    expect(readoutStates("B", false)).toEqual([0]);
  });

  it("lays out '01' as two displays with a gap", () => {
    const cells = layoutReadout("01", { width: 200, height: 100 });
    expect(cells).toEqual([
      { character: "0", frame: { x: 0, y: 0, width: 95, height: 100 }, state: 0x3f },
      { character: "1", frame: { x: 105, y: 0, width: 95, height: 100 }, state: 0x06 },
    ]);
    expect(cells[1].frame.x - (cells[0].frame.x + cells[0].frame.width)).toBeGreaterThan(0);
  });

  it("splits by code point and handles empty text", () => {
    expect(layoutReadout("")).toEqual([]);
    const cells = layoutReadout("a😀", { width: 100, height: 50 });
    expect(cells.map((c) => c.character)).toEqual(["a", "😀"]);
    expect(cells[1].state).toBe(0);
  });

  it("uses the natural 9:16 size when no size is given", () => {
    expect(readoutSize(2)).toEqual({ width: 72, height: 64 });
    expect(layoutReadout("0")[0].frame).toEqual({ x: 0, y: 0, width: 36, height: 64 });
  });

  it("renders each display in its cell and lights requested periods", () => {
    const r = renderReadout("12", {
      color: "#fff",
      colorModel: cssColorModel,
      size: { width: 200, height: 100 },
      periods: new Set([0]),
    });
    expect(r.size).toEqual({ width: 200, height: 100 });
    expect(r.displays.map((d) => d.cell.state)).toEqual([0x86, 0x5b]);
    expect(r.displays[1].rendering.size).toEqual({ width: 95, height: 100 });
    expect(r.displays[0].rendering.segments[7].lit).toBe(true);
  });
});
