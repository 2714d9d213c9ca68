import { colorToHex } from "@/phasor/colors";
import type { IGraphics } from "./IGraphics";

interface StrokeStyle {
  width: number;
  color: number;
  alpha: number;
}

/** Two decimals is well below a pixel */
function fmt(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * IGraphics back end that records drawing calls as SVG elements.
 */
export class SvgGraphics implements IGraphics {
  private elements: string[] = [];
  private style: StrokeStyle = { width: 1, color: 0x000000, alpha: 1 };
  private pathData: string[] = [];

  constructor(
    readonly width: number,
    readonly height: number,
    readonly backgroundColor = 0xffffff
  ) {}

  clear(): void {
    this.elements = [];
    this.pathData = [];
  }

  lineStyle(width: number, color: number, alpha = 1): void {
    this.style = { width, color, alpha };
  }

  lineBetween(x1: number, y1: number, x2: number, y2: number): void {
    this.elements.push(
      `<line x1="${fmt(x1)}" y1="${fmt(y1)}" x2="${fmt(x2)}" y2="${fmt(y2)}" ${this.strokeAttributes()}/>`
    );
  }

  beginPath(): void {
    this.pathData = [];
  }

  moveTo(x: number, y: number): void {
    this.pathData.push(`M${fmt(x)} ${fmt(y)}`);
  }

  lineTo(x: number, y: number): void {
    this.pathData.push(`L${fmt(x)} ${fmt(y)}`);
  }

  strokePath(): void {
    if (this.pathData.length === 0) return;
    this.elements.push(`<path d="${this.pathData.join(" ")}" fill="none" ${this.strokeAttributes()}/>`);
    this.pathData = [];
  }

  fillText(x: number, y: number, text: string, color: number, fontSize: number): void {
    this.elements.push(
      `<text x="${fmt(x)}" y="${fmt(y)}" fill="${colorToHex(color)}" font-size="${fmt(fontSize)}" ` +
        `font-family="sans-serif" text-anchor="middle" dominant-baseline="middle">${escapeXml(text)}</text>`
    );
  }

  /**
   * Recorded elements, in drawing order.
   */
  getElements(): readonly string[] {
    return this.elements;
  }

  toString(): string {
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}">`,
      `<rect width="100%" height="100%" fill="${colorToHex(this.backgroundColor)}"/>`,
      ...this.elements,
      "</svg>",
      "",
    ].join("\n");
  }

  private strokeAttributes(): string {
    const { width, color, alpha } = this.style;
    const opacity = alpha < 1 ? ` stroke-opacity="${fmt(alpha)}"` : "";
    return `stroke="${colorToHex(color)}" stroke-width="${fmt(width)}"${opacity} stroke-linecap="round"`;
  }
}
