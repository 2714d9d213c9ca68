/**
 * PngGraphics - IGraphics back end rasterizing strokes into a pngjs image
 *
 * Lines are drawn with Bresenham's algorithm and a square brush. There is no
 * font rasterizer, so fillText is not provided and labels are skipped.
 */

import { PNG } from "pngjs";
import type { Vector2 } from "@/types";
import type { IGraphics } from "./IGraphics";

interface Rgb {
  r: number;
  g: number;
  b: number;
}

function toRgb(color: number): Rgb {
  return { r: (color >> 16) & 0xff, g: (color >> 8) & 0xff, b: color & 0xff };
}

export class PngGraphics implements IGraphics {
  readonly png: PNG;
  private color: Rgb = { r: 0, g: 0, b: 0 };
  private alpha = 1;
  private brushRadius = 0;
  private path: Vector2[][] = [];

  constructor(
    readonly width: number,
    readonly height: number,
    readonly backgroundColor = 0xffffff
  ) {
    this.png = new PNG({ width, height });
    this.clear();
  }

  clear(): void {
    const { r, g, b } = toRgb(this.backgroundColor);
    const data = this.png.data;
    for (let i = 0; i < data.length; i += 4) {
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
      data[i + 3] = 255;
    }
    this.path = [];
  }

  lineStyle(width: number, color: number, alpha = 1): void {
    this.color = toRgb(color);
    this.alpha = Math.min(1, Math.max(0, alpha));
    this.brushRadius = Math.max(0, Math.floor((width - 1) / 2));
  }

  lineBetween(x1: number, y1: number, x2: number, y2: number): void {
    // Nothing to rasterize, and the stepping below would never reach the end
    if (![x1, y1, x2, y2].every(Number.isFinite)) return;

    let x = Math.round(x1);
    let y = Math.round(y1);
    const xEnd = Math.round(x2);
    const yEnd = Math.round(y2);
    const dx = Math.abs(xEnd - x);
    const dy = -Math.abs(yEnd - y);
    const stepX = x < xEnd ? 1 : -1;
    const stepY = y < yEnd ? 1 : -1;
    let err = dx + dy;

    for (;;) {
      this.stamp(x, y);
      if (x === xEnd && y === yEnd) break;
      const e2 = 2 * err;
      if (e2 >= dy) {
        err += dy;
        x += stepX;
      }
      if (e2 <= dx) {
        err += dx;
        y += stepY;
      }
    }
  }

  beginPath(): void {
    this.path = [];
  }

  moveTo(x: number, y: number): void {
    this.path.push([{ x, y }]);
  }

  lineTo(x: number, y: number): void {
    const current = this.path[this.path.length - 1];
    if (current) {
      current.push({ x, y });
    } else {
      this.path.push([{ x, y }]);
    }
  }

  strokePath(): void {
    for (const subpath of this.path) {
      for (let i = 1; i < subpath.length; i++) {
        const a = subpath[i - 1];
        const b = subpath[i];
        if (a && b) this.lineBetween(a.x, a.y, b.x, b.y);
      }
    }
    this.path = [];
  }

  /**
   * Encode the current image.
   */
  toBuffer(): Buffer {
    return PNG.sync.write(this.png);
  }

  /**
   * RGB of one pixel; null outside the image.
   */
  getPixel(x: number, y: number): Rgb | null {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null;
    const idx = (y * this.width + x) * 4;
    const data = this.png.data;
    return { r: data[idx] ?? 0, g: data[idx + 1] ?? 0, b: data[idx + 2] ?? 0 };
  }

  private stamp(cx: number, cy: number): void {
    const r = this.brushRadius;
    for (let y = cy - r; y <= cy + r; y++) {
      for (let x = cx - r; x <= cx + r; x++) {
        this.blend(x, y);
      }
    }
  }

  private blend(x: number, y: number): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    const idx = (y * this.width + x) * 4;
    const data = this.png.data;
    const a = this.alpha;
    data[idx] = Math.round(this.color.r * a + (data[idx] ?? 0) * (1 - a));
    data[idx + 1] = Math.round(this.color.g * a + (data[idx + 1] ?? 0) * (1 - a));
    data[idx + 2] = Math.round(this.color.b * a + (data[idx + 2] ?? 0) * (1 - a));
    data[idx + 3] = 255;
  }
}
