import { describe, it, expect, beforeEach } from "vitest";
import { SvgGraphics } from "@/render/SvgGraphics";

describe("SvgGraphics", () => {
  let svg: SvgGraphics;

  beforeEach(() => {
    svg = new SvgGraphics(100, 50);
  });

  it("should record a line with the current stroke", () => {
    svg.lineStyle(2, 0xff0000);
    svg.lineBetween(0, 0, 10.556, 20);

    expect(svg.getElements()).toEqual([
      '<line x1="0" y1="0" x2="10.56" y2="20" stroke="#ff0000" stroke-width="2" stroke-linecap="round"/>',
    ]);
  });

  it("should add an opacity only for translucent strokes", () => {
    svg.lineStyle(1, 0x00ff00, 0.5);
    svg.lineBetween(1, 2, 3, 4);

    expect(svg.getElements()[0]).toBe(
      '<line x1="1" y1="2" x2="3" y2="4" stroke="#00ff00" stroke-width="1" stroke-opacity="0.5" stroke-linecap="round"/>'
    );
  });

  it("should turn a stroked path into a path element", () => {
    svg.beginPath();
    svg.moveTo(1, 2);
    svg.lineTo(3, 4);
    svg.lineTo(5, 2);
    svg.strokePath();

    expect(svg.getElements()).toEqual([
      '<path d="M1 2 L3 4 L5 2" fill="none" stroke="#000000" stroke-width="1" stroke-linecap="round"/>',
    ]);
  });

  it("should ignore stroking an empty path", () => {
    svg.beginPath();
    svg.strokePath();
    expect(svg.getElements()).toHaveLength(0);
  });

  it("should escape label text", () => {
    svg.fillText(5, 6, "I<a>&", 0x0000ff, 14);

    expect(svg.getElements()).toEqual([
      '<text x="5" y="6" fill="#0000ff" font-size="14" font-family="sans-serif" text-anchor="middle" dominant-baseline="middle">I&lt;a&gt;&amp;</text>',
    ]);
  });

  it("should wrap elements in a sized document with a background", () => {
    svg.lineBetween(0, 0, 1, 1);

    expect(svg.toString().split("\n")).toEqual([
      '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="50" viewBox="0 0 100 50">',
      '<rect width="100%" height="100%" fill="#ffffff"/>',
      '<line x1="0" y1="0" x2="1" y2="1" stroke="#000000" stroke-width="1" stroke-linecap="round"/>',
      "</svg>",
      "",
    ]);
  });

  it("should drop recorded elements on clear", () => {
    svg.lineBetween(0, 0, 1, 1);
    svg.clear();
    expect(svg.getElements()).toHaveLength(0);
  });
});
