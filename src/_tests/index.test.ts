import { describe, it, expect } from "vitest";
import { blankDisplayState, displayState, geometry, layoutReadout, segmentsOf } from "../index";

describe("public surface", () => {
  it("exposes blank and character states", () => {
    expect(blankDisplayState()).toBe(0);
    expect(displayState("7")).toBe(0x07);
    expect(displayState("R", false)).toBeNull();
    expect(displayState("R")).toBe(0x50);
  });

  it("segmentsOf iterates by ascending bit", () => {
    expect(segmentsOf(displayState("4") ?? 0)).toEqual(["topRight", "bottomRight", "topLeft", "center"]);
  });

  it("geometry returns frame and outline", () => {
    const g = geometry("center", { width: 90, height: 160 });
    expect(g.kind).toBe("horizontal");
    expect(g.shape.type).toBe("polygon");
  });

  it("layoutReadout('01') yields the table states with a gap", () => {
    const [a, b] = layoutReadout("01");
    expect([a.state, b.state]).toEqual([displayState("0"), displayState("1")]);
    expect(b.frame.x).toBeGreaterThan(a.frame.x + a.frame.width);
  });
});
