import { DEFAULT_BOUNDS_OPTIONS, type BoundsOptions } from "@/phasor/DiagramBounds";
import type { ReferenceCircle, Vector2 } from "@/types";

/**
 * Options for laying out and drawing a phasor diagram
 */
export interface DiagramOptions {
  readonly title: string;
  /** Output size in pixels */
  readonly width: number;
  readonly height: number;
  readonly backgroundColor: number;
  /** Keep one world unit the same length on both axes */
  readonly equalAspect: boolean;
  readonly showGrid: boolean;
  /** Grid spacing in world units; 0 picks a spacing from the view size */
  readonly gridSpacing: number;
  readonly gridColor: number;
  readonly axisColor: number;
  /** World point the reference axes cross at */
  readonly axesOrigin: Vector2;
  readonly referenceCircles: readonly ReferenceCircle[];
  /** Shaft width in pixels for phasors without their own arrowWidth */
  readonly lineWidth: number;
  /** Arrow head stroke length in pixels */
  readonly arrowHeadLength: number;
  /** Angle between shaft and each head stroke, in degrees */
  readonly arrowHeadAngleDeg: number;
  /** Default distance of a label from the shaft midpoint, in world units */
  readonly labelOffset: number;
  readonly fontSize: number;
  /** Pixels kept free around the plotted area */
  readonly padding: number;
  readonly bounds: BoundsOptions;
}

/**
 * Default diagram options
 */
export const DEFAULT_DIAGRAM_OPTIONS: DiagramOptions = {
  title: "Phasor Diagram",
  width: 800,
  height: 800,
  backgroundColor: 0xffffff,
  equalAspect: true,
  showGrid: true,
  gridSpacing: 0,
  gridColor: 0xd3d3d3,
  axisColor: 0x000000,
  axesOrigin: { x: 0, y: 0 },
  referenceCircles: [],
  lineWidth: 2,
  arrowHeadLength: 12,
  arrowHeadAngleDeg: 25,
  labelOffset: 0.1,
  fontSize: 14,
  padding: 40,
  bounds: DEFAULT_BOUNDS_OPTIONS,
};

/** Any subset of the options; bounds may be partial too */
export type DiagramConfigInput = Partial<Omit<DiagramOptions, "bounds">> & {
  readonly bounds?: Partial<BoundsOptions>;
};

/**
 * Merge caller options over the defaults.
 */
export function createDiagramConfig(options: DiagramConfigInput = {}): DiagramOptions {
  return {
    ...DEFAULT_DIAGRAM_OPTIONS,
    ...options,
    bounds: { ...DEFAULT_DIAGRAM_OPTIONS.bounds, ...options.bounds },
  };
}
