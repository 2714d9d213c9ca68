/**
 * PhasorRenderSystem.test.ts
 *
 * Layout used throughout: a 240x240 viewport with 20px padding. With Vs
 * from (0,0) to (10,0) the fitted world box is x in [-1, 11], y in [-1, 1],
 * so one world unit is 200/12 px and world (0,0) lands on screen
 * (36.67, 120).
 */

import { describe, it, expect, beforeEach } from "vitest";
import { PhasorRegistry } from "@/phasor/PhasorRegistry";
import type { IGraphics } from "@/render/IGraphics";
import type { Phasor } from "@/types";
import { PhasorRenderSystem, labelPosition, niceGridStep } from "@/render/PhasorRenderSystem";
import {
  absolute,
  callsOfType,
  createMockGraphics,
  polar,
  relative,
  type MockGraphics,
} from "@test/helpers/phasorHelpers";

const UNIT = 200 / 12;
const LAYOUT = { width: 240, height: 240, padding: 20, title: "", showGrid: false };

describe("PhasorRenderSystem", () => {
  let graphics: MockGraphics;
  let registry: PhasorRegistry;

  beforeEach(() => {
    graphics = createMockGraphics();
    registry = new PhasorRegistry();
  });

  describe("phasor arrows", () => {
    it("should draw the shaft from start to end in screen space", () => {
      registry.add("Vs", { geometry: polar(10, 0), anchor: absolute(0, 0) });
      new PhasorRenderSystem(graphics, LAYOUT).render(registry.list());

      const lines = callsOfType(graphics, "lineBetween");
      const shaft = lines[lines.length - 1];
      expect(shaft?.x1).toBeCloseTo(20 + UNIT, 6);
      expect(shaft?.y1).toBeCloseTo(120, 6);
      expect(shaft?.x2).toBeCloseTo(20 + 11 * UNIT, 6);
      expect(shaft?.y2).toBeCloseTo(120, 6);
    });

    it("should use each phasor's own color", () => {
      registry.add("V", { geometry: polar(10, 0) });
      registry.add("I", { geometry: polar(3, -30), anchor: relative("V"), kind: "current" });
      new PhasorRenderSystem(graphics, LAYOUT).render(registry.list());

      const colors = callsOfType(graphics, "lineStyle").map((call) => call.color);
      expect(colors).toEqual([0x000000, 0x0000ff, 0xff0000]);
    });

    it("should draw a symmetric two-stroke head meeting at the tip", () => {
      registry.add("Vs", { geometry: polar(10, 0) });
      new PhasorRenderSystem(graphics, LAYOUT).render(registry.list());

      const [left] = callsOfType(graphics, "moveTo");
      const [tip, right] = callsOfType(graphics, "lineTo");
      const tipX = 20 + 11 * UNIT;

      expect(tip?.x1).toBeCloseTo(tipX, 6);
      expect(tip?.y1).toBeCloseTo(120, 6);
      expect(left?.x1).toBeCloseTo(tipX - 12 * Math.cos((25 * Math.PI) / 180), 6);
      expect(right?.x1).toBeCloseTo(tipX - 12 * Math.cos((25 * Math.PI) / 180), 6);
      expect((left?.y1 ?? 0) + (right?.y1 ?? 0)).toBeCloseTo(240, 6);
      expect(callsOfType(graphics, "strokePath")).toHaveLength(1);
    });

    it("should use a phasor's own arrow width, label and label offset", () => {
      registry.add("Vs", { geometry: polar(10, 0), label: "V_s", labelOffset: 1, arrowWidth: 5 });
      new PhasorRenderSystem(graphics, LAYOUT).render(registry.list());

      const [, shaftStyle] = callsOfType(graphics, "lineStyle");
      expect(shaftStyle).toEqual({ type: "lineStyle", width: 5, color: 0x0000ff, alpha: 1 });

      const [label] = callsOfType(graphics, "fillText");
      expect(label?.text).toBe("V_s");
      expect(label?.x1).toBeCloseTo(120 + UNIT, 6);
      expect(label?.y1).toBeCloseTo(120, 6);
    });

    it("should skip the head of a zero-length phasor", () => {
      registry.add("Z", { geometry: polar(0, 45), anchor: absolute(1, 1) });
      new PhasorRenderSystem(graphics, LAYOUT).render(registry.list());

      expect(callsOfType(graphics, "beginPath")).toHaveLength(0);
      expect(callsOfType(graphics, "fillText")).toHaveLength(1);
    });
  });

  describe("labels", () => {
    it("should place the label past the shaft midpoint", () => {
      registry.add("Vs", { geometry: polar(10, 0) });
      new PhasorRenderSystem(graphics, LAYOUT).render(registry.list());

      const [label] = callsOfType(graphics, "fillText");
      expect(label?.text).toBe("Vs");
      expect(label?.color).toBe(0x0000ff);
      expect(label?.fontSize).toBe(14);
      expect(label?.x1).toBeCloseTo(120 + 0.1 * UNIT, 6);
      expect(label?.y1).toBeCloseTo(120, 6);
    });

    it("should offset along the phasor's own angle", () => {
      const p = registry.add("P", { geometry: polar(2, 90), anchor: absolute(1, 0) });
      const pos = labelPosition(p, 0.5);

      expect(pos.x).toBeCloseTo(1, 12);
      expect(pos.y).toBeCloseTo(1.5, 12);
    });

    it("should skip labels on graphics without text support", () => {
      const lineOnly: IGraphics = {
        clear: graphics.clear,
        lineStyle: graphics.lineStyle,
        lineBetween: graphics.lineBetween,
        beginPath: graphics.beginPath,
        moveTo: graphics.moveTo,
        lineTo: graphics.lineTo,
        strokePath: graphics.strokePath,
      };
      registry.add("Vs", { geometry: polar(10, 0) });

      expect(() =>
        new PhasorRenderSystem(lineOnly, { ...LAYOUT, title: "Demo" }).render(registry.list())
      ).not.toThrow();
      expect(graphics.lineBetween).toHaveBeenCalled();
      expect(graphics.fillText).not.toHaveBeenCalled();
    });
  });

  describe("frame", () => {
    it("should clear first and draw axes through the world origin", () => {
      registry.add("Vs", { geometry: polar(10, 0) });
      new PhasorRenderSystem(graphics, LAYOUT).render(registry.list());

      expect(graphics.calls[0]?.type).toBe("clear");
      const [horizontal, vertical] = callsOfType(graphics, "lineBetween");
      expect(horizontal?.y1).toBeCloseTo(120, 6);
      expect(horizontal?.y2).toBeCloseTo(120, 6);
      expect(horizontal?.x1).toBeCloseTo(20, 6);
      expect(horizontal?.x2).toBeCloseTo(220, 6);
      expect(vertical?.x1).toBeCloseTo(20 + UNIT, 6);
      expect(vertical?.x2).toBeCloseTo(20 + UNIT, 6);
    });

    it("should cross the axes at the configured origin", () => {
      // Fitted box [-1, 2] on both axes, 200/3 px per unit
      new PhasorRenderSystem(graphics, { ...LAYOUT, axesOrigin: { x: 1, y: 1 } }).render([]);

      const [horizontal, vertical] = callsOfType(graphics, "lineBetween");
      expect(horizontal?.y1).toBeCloseTo(20 + 200 / 3, 6);
      expect(vertical?.x1).toBeCloseTo(20 + 400 / 3, 6);
    });

    it("should draw a reference circle as dashes and fit it into view", () => {
      // Fitted box [-2, 2] on both axes, 50 px per unit
      new PhasorRenderSystem(graphics, {
        ...LAYOUT,
        referenceCircles: [{ center: { x: 0, y: 0 }, radius: 1 }],
      }).render([]);

      const circleStyle = graphics.calls.findIndex((call) => call.type === "lineStyle" && call.color === 0x808080);
      expect(circleStyle).toBeGreaterThan(0);

      const dashes = graphics.calls.slice(circleStyle + 1);
      expect(dashes).toHaveLength(36);
      expect(dashes.every((call) => call.type === "lineBetween")).toBe(true);
      expect(dashes[0]?.x1).toBeCloseTo(170, 6);
      expect(dashes[0]?.y1).toBeCloseTo(120, 6);
    });

    it("should skip the grid when the view is not finite", () => {
      const runaway: Phasor = {
        name: "W",
        kind: "voltage",
        start: { x: 0, y: 0 },
        end: { x: Number.POSITIVE_INFINITY, y: 0 },
        magnitude: Number.POSITIVE_INFINITY,
        angleDeg: 0,
        color: "blue",
        label: "W",
      };
      new PhasorRenderSystem(graphics, { ...LAYOUT, showGrid: true }).render([runaway]);

      const styles = callsOfType(graphics, "lineStyle").map((call) => call.color);
      expect(styles).not.toContain(0xd3d3d3);
    });

    it("should skip a grid too dense to draw", () => {
      registry.add("Vs", { geometry: polar(10, 0) });
      new PhasorRenderSystem(graphics, { ...LAYOUT, showGrid: true, gridSpacing: 0.001 }).render(registry.list());

      const styles = callsOfType(graphics, "lineStyle").map((call) => call.color);
      expect(styles).toEqual([0x000000, 0x0000ff]);
    });

    it("should draw the title centered in the top padding", () => {
      new PhasorRenderSystem(graphics, { ...LAYOUT, title: "Demo" }).render([]);

      const [title] = callsOfType(graphics, "fillText");
      expect(title).toEqual({ type: "fillText", x1: 120, y1: 10, text: "Demo", color: 0x000000, fontSize: 14 });
    });

    it("should draw grid lines before the axes", () => {
      registry.add("Vs", { geometry: polar(10, 0) });
      new PhasorRenderSystem(graphics, { ...LAYOUT, showGrid: true, gridSpacing: 5 }).render(registry.list());

      const styleIndexes = graphics.calls
        .map((call, index) => (call.type === "lineStyle" ? index : -1))
        .filter((index) => index >= 0);
      const [gridStyle, axisStyle] = styleIndexes;

      expect(graphics.calls[gridStyle ?? 0]).toEqual({ type: "lineStyle", width: 1, color: 0xd3d3d3, alpha: 0.7 });
      // x = 0, 5, 10 and y = -5, 0, 5 inside the visible area
      const gridLines = graphics.calls.slice((gridStyle ?? 0) + 1, axisStyle);
      expect(gridLines).toHaveLength(6);
      expect(gridLines.every((call) => call.type === "lineBetween")).toBe(true);
    });

    it("should expose the view of the last render", () => {
      const system = new PhasorRenderSystem(graphics, LAYOUT);
      expect(system.getView()).toBeNull();

      registry.add("Vs", { geometry: polar(10, 0) });
      system.render(registry.list());
      expect(system.getView()?.scaleX).toBeCloseTo(UNIT, 10);

      system.dispose();
      expect(system.getView()).toBeNull();
    });
  });
});

describe("niceGridStep", () => {
  it.each([
    [12, 2],
    [37, 5],
    [100, 10],
    [0, 1],
  ])("should pick a 1/2/5 step for span %s", (span, expected) => {
    expect(niceGridStep(span)).toBe(expected);
  });
});
