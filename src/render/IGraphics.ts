/**
 * Graphics interface for rendering.
 *
 * Coordinates are screen pixels, y pointing down. Colors are 0xRRGGBB.
 */
export interface IGraphics {
  clear(): void;
  lineStyle(width: number, color: number, alpha?: number): void;
  lineBetween(x1: number, y1: number, x2: number, y2: number): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  strokePath(): void;
  /**
   * Draw text centered on (x, y). Back ends without text support leave it out
   * and labels are skipped.
   */
  fillText?(x: number, y: number, text: string, color: number, fontSize: number): void;
}
