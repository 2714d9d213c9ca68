/**
 * Phasor colors: kind defaults and name/hex resolution for graphics back ends.
 */

import type { PhasorKind } from "@/types";

export const VOLTAGE_COLOR = "blue";
export const CURRENT_COLOR = "red";
/** Used for any kind other than voltage and current */
export const NEUTRAL_COLOR = "gray";

/**
 * Named colors understood by the renderers. Anything else must be "#rrggbb".
 */
const NAMED_COLORS: ReadonlyMap<string, number> = new Map([
  ["black", 0x000000],
  ["white", 0xffffff],
  ["gray", 0x808080],
  ["grey", 0x808080],
  ["lightgray", 0xd3d3d3],
  ["red", 0xff0000],
  ["green", 0x008000],
  ["blue", 0x0000ff],
  ["cyan", 0x00ffff],
  ["magenta", 0xff00ff],
  ["yellow", 0xffff00],
  ["orange", 0xffa500],
  ["purple", 0x800080],
  ["brown", 0xa52a2a],
]);

const NEUTRAL_VALUE = 0x808080;

const HEX_PATTERN = /^#([0-9a-f]{6}|[0-9a-f]{3})$/i;

/**
 * Default display color for a kind (case-insensitive).
 */
export function defaultColorForKind(kind: PhasorKind): string {
  switch (kind.toLowerCase()) {
    case "voltage":
      return VOLTAGE_COLOR;
    case "current":
      return CURRENT_COLOR;
    default:
      return NEUTRAL_COLOR;
  }
}

/**
 * Check whether a color string can be resolved by {@link colorToNumber}.
 */
export function isKnownColor(color: string): boolean {
  return NAMED_COLORS.has(color.toLowerCase()) || HEX_PATTERN.test(color);
}

/**
 * Resolve a color name or hex string to 0xRRGGBB.
 * Unknown colors fall back to the neutral color.
 */
export function colorToNumber(color: string): number {
  const named = NAMED_COLORS.get(color.toLowerCase());
  if (named !== undefined) return named;

  const match = HEX_PATTERN.exec(color);
  const digits = match?.[1];
  if (!digits) return NEUTRAL_VALUE;

  const full =
    digits.length === 3
      ? digits
          .split("")
          .map((c) => c + c)
          .join("")
      : digits;
  return parseInt(full, 16);
}

/**
 * Format 0xRRGGBB as "#rrggbb".
 */
export function colorToHex(color: number): string {
  return `#${color.toString(16).padStart(6, "0")}`;
}
