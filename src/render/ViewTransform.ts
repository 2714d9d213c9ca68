import type { Bounds, Vector2 } from "@/types";

export interface Viewport {
  readonly width: number;
  readonly height: number;
  /** Pixels kept free on every side */
  readonly padding: number;
}

/**
 * Maps world coordinates (y up) into a pixel viewport (y down).
 *
 * With equal aspect the smaller of the two axis scales is used on both axes
 * and the plot is centered in the leftover space.
 */
export class ViewTransform {
  readonly scaleX: number;
  readonly scaleY: number;
  private readonly offsetX: number;
  private readonly offsetY: number;

  constructor(
    readonly bounds: Bounds,
    viewport: Viewport,
    equalAspect = true
  ) {
    const innerWidth = Math.max(1, viewport.width - 2 * viewport.padding);
    const innerHeight = Math.max(1, viewport.height - 2 * viewport.padding);
    const spanX = Math.max(bounds.maxX - bounds.minX, Number.EPSILON);
    const spanY = Math.max(bounds.maxY - bounds.minY, Number.EPSILON);

    let sx = innerWidth / spanX;
    let sy = innerHeight / spanY;
    if (equalAspect) {
      sx = sy = Math.min(sx, sy);
    }

    this.scaleX = sx;
    this.scaleY = sy;
    this.offsetX = viewport.padding + (innerWidth - spanX * sx) / 2;
    this.offsetY = viewport.padding + (innerHeight - spanY * sy) / 2;
  }

  toScreen(point: Vector2): Vector2 {
    return {
      x: this.offsetX + (point.x - this.bounds.minX) * this.scaleX,
      y: this.offsetY + (this.bounds.maxY - point.y) * this.scaleY,
    };
  }

  toWorld(point: Vector2): Vector2 {
    return {
      x: this.bounds.minX + (point.x - this.offsetX) / this.scaleX,
      y: this.bounds.maxY - (point.y - this.offsetY) / this.scaleY,
    };
  }
}
