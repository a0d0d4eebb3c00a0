import { describe, it, expect } from "vitest";
import { geometry, shapeFor } from "../shape";

describe("geometry/shape", () => {
  it("horizontal bar is a hexagon with pointed ends", () => {
    expect(shapeFor("horizontal", { x: 10, y: 20, width: 40, height: 8 })).toEqual({
      type: "polygon",
      points: [
        { x: 50, y: 24 },
        { x: 46, y: 28 },
        { x: 14, y: 28 },
        { x: 10, y: 24 },
        { x: 14, y: 20 },
        { x: 46, y: 20 },
      ],
    });
  });

  it("vertical bar starts at the bottom midpoint", () => {
    expect(shapeFor("vertical", { x: 0, y: 0, width: 6, height: 30 })).toEqual({
      type: "polygon",
      points: [
        { x: 3, y: 30 },
        { x: 6, y: 27 },
        { x: 6, y: 3 },
        { x: 3, y: 0 },
        { x: 0, y: 3 },
        { x: 0, y: 27 },
      ],
    });
  });

  it("dot is the inscribed ellipse", () => {
    expect(shapeFor("dot", { x: 2, y: 4, width: 6, height: 10 })).toEqual({
      type: "ellipse",
      cx: 5,
      cy: 9,
      rx: 3,
      ry: 5,
    });
  });

  it("zero-area frames give zero-area shapes", () => {
    const shape = shapeFor("horizontal", { x: 0, y: 0, width: 0, height: 0 });
    expect(shape.type === "polygon" && shape.points.every((p) => p.x === 0 && p.y === 0)).toBe(true);
  });

  it("geometry combines frame and outline", () => {
    expect(geometry("period", { width: 90, height: 160 })).toEqual({
      segment: "period",
      kind: "dot",
      origin: { x: 81, y: 151 },
      size: { width: 9, height: 9 },
      shape: { type: "ellipse", cx: 85.5, cy: 155.5, rx: 4.5, ry: 4.5 },
    });
  });
});
