/**
 * Core type definitions for phasor diagrams
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable) */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/** Axis-aligned bounding box in world coordinates */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

// =============================================================================
// PHASOR TYPES
// =============================================================================

/**
 * Classification tag for a phasor. Open-ended: only "voltage" and "current"
 * have a dedicated default color.
 */
export type PhasorKind = "voltage" | "current" | (string & {});

/** Which point of a referenced phasor a new phasor starts from */
export type RefPoint = "start" | "end";

/** End point given directly */
export interface CartesianGeometry {
  readonly kind: "cartesian";
  readonly endX: number;
  readonly endY: number;
}

/** End point derived from the start point, a length and a direction */
export interface PolarGeometry {
  readonly kind: "polar";
  readonly magnitude: number;
  readonly angleDeg: number;
}

export type GeometrySpec = CartesianGeometry | PolarGeometry;

/** Start at explicit coordinates (origin when omitted) */
export interface AbsoluteAnchor {
  readonly kind: "absolute";
  readonly x?: number;
  readonly y?: number;
}

/** Start at the start or end point of an already registered phasor */
export interface RelativeAnchor {
  readonly kind: "relative";
  readonly ref: string;
  readonly point: RefPoint;
}

export type Anchor = AbsoluteAnchor | RelativeAnchor;

/** Everything needed to resolve a phasor besides its name */
export interface PhasorSpec {
  readonly geometry: GeometrySpec;
  /** Defaults to the absolute origin */
  readonly anchor?: Anchor;
  /** Defaults to "voltage" */
  readonly kind?: PhasorKind;
  /** Overrides the kind's default color */
  readonly color?: string;
  /** Text drawn beside the arrow; defaults to the name */
  readonly label?: string;
  /** Label distance from the shaft midpoint in world units; overrides the diagram's */
  readonly labelOffset?: number;
  /** Shaft stroke width in pixels; overrides the diagram's */
  readonly arrowWidth?: number;
}

/**
 * A resolved phasor. Coordinates are absolute; magnitude and angle are
 * derived from them at creation and never change afterwards.
 */
export interface Phasor {
  readonly name: string;
  readonly kind: PhasorKind;
  readonly start: Vector2;
  readonly end: Vector2;
  readonly magnitude: number;
  /** Degrees, normalized to (-180, 180] */
  readonly angleDeg: number;
  readonly color: string;
  readonly label: string;
  readonly labelOffset?: number;
  readonly arrowWidth?: number;
}

/** One link of a phasor chain ("label,magnitude,angle") */
export interface ChainLink {
  readonly label: string;
  readonly magnitude: number;
  readonly angleDeg: number;
}

/** Dashed circle drawn behind the phasors, e.g. the locus of a magnitude */
export interface ReferenceCircle {
  readonly center: Vector2;
  readonly radius: number;
  /** 0xRRGGBB; gray when omitted */
  readonly color?: number;
}

// =============================================================================
// REGISTRY TYPES
// =============================================================================

/** What to do when a name is added twice */
export type DuplicatePolicy = "reject" | "overwrite";

export interface RegistryOptions {
  readonly onDuplicate: DuplicatePolicy;
}

/** Default registry configuration */
export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
  onDuplicate: "reject",
};
