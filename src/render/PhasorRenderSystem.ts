/**
 * PhasorRenderSystem - Draws resolved phasors into an IGraphics
 *
 * Draw order: grid, reference axes, reference circles, title, then each
 * phasor in creation order (shaft, arrow head, label). The view is
 * auto-scaled to fit every start/end point and reference circle.
 */

import {
  createDiagramConfig,
  type DiagramConfigInput,
  type DiagramOptions,
} from "@/config/diagramConfig";
import { Vec2 } from "@/math/Vec2";
import { colorToNumber } from "@/phasor/colors";
import { computeDiagramBounds } from "@/phasor/DiagramBounds";
import type { Bounds, Phasor, ReferenceCircle, Vector2 } from "@/types";
import type { IGraphics } from "./IGraphics";
import { ViewTransform } from "./ViewTransform";

const GRID_LINE_WIDTH = 1;
const GRID_ALPHA = 0.7;
const AXIS_LINE_WIDTH = 1;
const TARGET_GRID_LINES = 10;
const MAX_GRID_LINES = 1000;
const REFERENCE_COLOR = 0x808080;
/** Arc pieces per circle; every other one is drawn */
const CIRCLE_SEGMENTS = 72;

/**
 * Pick a 1/2/5 x 10^k step giving roughly `span / target` sized cells.
 */
export function niceGridStep(span: number, target = TARGET_GRID_LINES): number {
  if (!(span > 0)) return 1;
  const raw = span / target;
  const power = Math.pow(10, Math.floor(Math.log10(raw)));
  const fraction = raw / power;
  const nice = fraction <= 1 ? 1 : fraction <= 2 ? 2 : fraction <= 5 ? 5 : 10;
  return nice * power;
}

/**
 * Where a phasor's label goes: the shaft midpoint pushed `offset` world
 * units along the phasor's own angle.
 */
export function labelPosition(phasor: Phasor, offset: number): Vector2 {
  const mid = Vec2.midpoint(phasor.start, phasor.end);
  return Vec2.add(mid, Vec2.fromPolar(offset, phasor.angleDeg));
}

function circleExtent(circle: ReferenceCircle): Vector2[] {
  const { center, radius } = circle;
  return [
    { x: center.x - radius, y: center.y - radius },
    { x: center.x + radius, y: center.y + radius },
  ];
}

export class PhasorRenderSystem {
  readonly id = "phasor-render";

  private graphics: IGraphics;
  private config: DiagramOptions;
  private lastView: ViewTransform | null = null;

  constructor(graphics: IGraphics, config: DiagramConfigInput = {}) {
    this.graphics = graphics;
    this.config = createDiagramConfig(config);
  }

  getConfig(): DiagramOptions {
    return this.config;
  }

  /**
   * The view used by the last render, or null before the first one.
   */
  getView(): ViewTransform | null {
    return this.lastView;
  }

  render(phasors: readonly Phasor[]): void {
    const extra = this.config.referenceCircles.flatMap(circleExtent);
    if (this.config.bounds.includeOrigin) extra.push(this.config.axesOrigin);
    const bounds = computeDiagramBounds(phasors, this.config.bounds, extra);
    const view = new ViewTransform(bounds, this.config, this.config.equalAspect);
    this.lastView = view;

    this.graphics.clear();

    if (this.config.showGrid) {
      this.renderGrid(view);
    }
    this.renderAxes(view);
    this.renderReferenceCircles(view);
    this.renderTitle();

    for (const phasor of phasors) {
      this.renderPhasor(phasor, view);
    }
  }

  dispose(): void {
    this.graphics.clear();
    this.lastView = null;
  }

  private renderGrid(view: ViewTransform): void {
    const { minX, minY, maxX, maxY } = visibleWorld(view, this.config);
    const step =
      this.config.gridSpacing > 0
        ? this.config.gridSpacing
        : niceGridStep(Math.max(maxX - minX, maxY - minY));

    const lineCount = (maxX - minX) / step + (maxY - minY) / step;
    if (!Number.isFinite(lineCount) || lineCount > MAX_GRID_LINES) return;

    this.graphics.lineStyle(GRID_LINE_WIDTH, this.config.gridColor, GRID_ALPHA);

    for (let x = Math.ceil(minX / step) * step; x <= maxX; x += step) {
      this.worldLine(view, { x, y: minY }, { x, y: maxY });
    }
    for (let y = Math.ceil(minY / step) * step; y <= maxY; y += step) {
      this.worldLine(view, { x: minX, y }, { x: maxX, y });
    }
  }

  private renderAxes(view: ViewTransform): void {
    const { minX, minY, maxX, maxY } = visibleWorld(view, this.config);
    const { x, y } = this.config.axesOrigin;
    this.graphics.lineStyle(AXIS_LINE_WIDTH, this.config.axisColor, 1);

    if (minY <= y && maxY >= y) {
      this.worldLine(view, { x: minX, y }, { x: maxX, y });
    }
    if (minX <= x && maxX >= x) {
      this.worldLine(view, { x, y: minY }, { x, y: maxY });
    }
  }

  /**
   * Dashed circles, as alternating arc chords.
   */
  private renderReferenceCircles(view: ViewTransform): void {
    for (const circle of this.config.referenceCircles) {
      if (!(circle.radius > 0)) continue;
      this.graphics.lineStyle(AXIS_LINE_WIDTH, circle.color ?? REFERENCE_COLOR, 1);

      const step = 360 / CIRCLE_SEGMENTS;
      for (let i = 0; i < CIRCLE_SEGMENTS; i += 2) {
        const a = Vec2.add(circle.center, Vec2.fromPolar(circle.radius, i * step));
        const b = Vec2.add(circle.center, Vec2.fromPolar(circle.radius, (i + 1) * step));
        this.worldLine(view, a, b);
      }
    }
  }

  private renderTitle(): void {
    if (!this.config.title) return;
    this.graphics.fillText?.(
      this.config.width / 2,
      this.config.padding / 2,
      this.config.title,
      this.config.axisColor,
      this.config.fontSize
    );
  }

  private renderPhasor(phasor: Phasor, view: ViewTransform): void {
    const color = colorToNumber(phasor.color);
    const start = view.toScreen(phasor.start);
    const end = view.toScreen(phasor.end);

    this.graphics.lineStyle(phasor.arrowWidth ?? this.config.lineWidth, color, 1);
    this.graphics.lineBetween(start.x, start.y, end.x, end.y);

    // A zero-length phasor has no direction to put a head on
    if (phasor.magnitude > 0) {
      this.renderArrowHead(start, end);
    }

    const label = view.toScreen(labelPosition(phasor, phasor.labelOffset ?? this.config.labelOffset));
    this.graphics.fillText?.(label.x, label.y, phasor.label, color, this.config.fontSize);
  }

  /**
   * Two strokes meeting at the tip, computed in screen space so the head
   * keeps its pixel size at any zoom.
   */
  private renderArrowHead(start: Vector2, tip: Vector2): void {
    const back = Math.atan2(start.y - tip.y, start.x - tip.x);
    const spread = (this.config.arrowHeadAngleDeg * Math.PI) / 180;
    const length = this.config.arrowHeadLength;

    const left = {
      x: tip.x + length * Math.cos(back + spread),
      y: tip.y + length * Math.sin(back + spread),
    };
    const right = {
      x: tip.x + length * Math.cos(back - spread),
      y: tip.y + length * Math.sin(back - spread),
    };

    this.graphics.beginPath();
    this.graphics.moveTo(left.x, left.y);
    this.graphics.lineTo(tip.x, tip.y);
    this.graphics.lineTo(right.x, right.y);
    this.graphics.strokePath();
  }

  private worldLine(view: ViewTransform, a: Vector2, b: Vector2): void {
    const p = view.toScreen(a);
    const q = view.toScreen(b);
    this.graphics.lineBetween(p.x, p.y, q.x, q.y);
  }
}

/**
 * The world rectangle actually covered by the viewport's inner area. With
 * equal aspect this is wider than the fitted bounds on one axis.
 */
function visibleWorld(view: ViewTransform, config: DiagramOptions): Bounds {
  const topLeft = view.toWorld({ x: config.padding, y: config.padding });
  const bottomRight = view.toWorld({
    x: config.width - config.padding,
    y: config.height - config.padding,
  });
  return {
    minX: Math.min(topLeft.x, bottomRight.x),
    minY: Math.min(topLeft.y, bottomRight.y),
    maxX: Math.max(topLeft.x, bottomRight.x),
    maxY: Math.max(topLeft.y, bottomRight.y),
  };
}
