import type { Bounds, Phasor, Vector2 } from "@/types";

export interface BoundsOptions {
  /** Keep (0, 0) inside the view, where the reference axes cross */
  readonly includeOrigin: boolean;
  /** Padding as a fraction of the span on each axis */
  readonly marginRatio: number;
  /** Padding never drops below this, in world units */
  readonly minMargin: number;
}

export const DEFAULT_BOUNDS_OPTIONS: BoundsOptions = {
  includeOrigin: true,
  marginRatio: 0.1,
  minMargin: 1,
};

/** View used when nothing has been drawn yet */
export const EMPTY_BOUNDS: Bounds = { minX: -1, minY: -1, maxX: 1, maxY: 1 };

/**
 * Bounding box of every start and end point (plus `extraPoints`), padded on
 * each axis by max(minMargin, marginRatio * span).
 */
export function computeDiagramBounds(
  phasors: readonly Phasor[],
  options: Partial<BoundsOptions> = {},
  extraPoints: readonly Vector2[] = []
): Bounds {
  const opts = { ...DEFAULT_BOUNDS_OPTIONS, ...options };
  const points: Vector2[] = [...phasors.flatMap((p) => [p.start, p.end]), ...extraPoints];
  if (points.length === 0) return EMPTY_BOUNDS;
  if (opts.includeOrigin) points.push({ x: 0, y: 0 });

  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;

  for (const point of points) {
    minX = Math.min(minX, point.x);
    minY = Math.min(minY, point.y);
    maxX = Math.max(maxX, point.x);
    maxY = Math.max(maxY, point.y);
  }

  const marginX = Math.max(opts.minMargin, opts.marginRatio * (maxX - minX));
  const marginY = Math.max(opts.minMargin, opts.marginRatio * (maxY - minY));

  return {
    minX: minX - marginX,
    minY: minY - marginY,
    maxX: maxX + marginX,
    maxY: maxY + marginY,
  };
}
