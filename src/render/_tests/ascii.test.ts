import { describe, it, expect } from "vitest";
import { asciiCell, asciiReadout } from "../ascii";
import { readoutStates } from "../readout";

describe("render/ascii", () => {
  it("draws a zero", () => {
    expect(asciiCell(0x3f)).toEqual([" _  ", "| | ", "|_| "]);
  });

  it("draws the period in the fourth column", () => {
    expect(asciiReadout([0x86])).toBe("\n  |\n  |.");
  });

  it("places characters side by side", () => {
    expect(asciiReadout(readoutStates("12"))).toBe(["     _", "  |  _|", "  | |_"].join("\n"));
  });
});
