/**
 * PhasorRegistry - Resolves named phasor specs into absolute geometry
 *
 * First Principles:
 * - Every stored phasor holds absolute start/end coordinates, never offsets
 * - An anchor can only name a phasor that already exists (backward-only,
 *   so reference chains are acyclic without any cycle detection)
 * - Resolution reads at most one other record: O(1), no chain walking
 * - Stored records and their points are frozen, so a relative start can
 *   share the referenced point object
 */

import { PhasorDebugLogger } from "@/debug/PhasorDebugLogger";
import { Vec2 } from "@/math/Vec2";
import {
  DEFAULT_REGISTRY_OPTIONS,
  type Anchor,
  type GeometrySpec,
  type Phasor,
  type PhasorSpec,
  type RegistryOptions,
  type Vector2,
} from "@/types";
import { defaultColorForKind, isKnownColor } from "./colors";
import {
  DuplicatePhasorError,
  InvalidGeometryError,
  InvalidPhasorInputError,
  MissingGeometryError,
  UnknownReferenceError,
} from "./errors";

const DEFAULT_KIND = "voltage";

export class PhasorRegistry {
  private readonly phasors: Map<string, Phasor> = new Map();
  private readonly options: RegistryOptions;

  constructor(options: Partial<RegistryOptions> = {}) {
    this.options = { ...DEFAULT_REGISTRY_OPTIONS, ...options };
  }

  /**
   * Resolve a spec against the current contents and store the result.
   *
   * Nothing is stored when resolution fails.
   *
   * @throws UnknownReferenceError if the anchor names a missing phasor
   * @throws MissingGeometryError if the geometry is absent or unrecognized
   * @throws InvalidGeometryError for an empty name or unusable numbers
   * @throws InvalidPhasorInputError for a color the renderers cannot resolve
   * @throws DuplicatePhasorError if the name exists and the policy is "reject"
   */
  add(name: string, spec: PhasorSpec): Phasor {
    try {
      const phasor = this.resolve(name, spec);
      this.insert(phasor);
      PhasorDebugLogger.logResolved(spec, phasor);
      return phasor;
    } catch (error) {
      if (error instanceof Error) {
        PhasorDebugLogger.logFailed(name, spec, error);
      }
      throw error;
    }
  }

  /**
   * Look up a phasor by name. Absent names yield undefined.
   */
  get(name: string): Phasor | undefined {
    return this.phasors.get(name);
  }

  has(name: string): boolean {
    return this.phasors.has(name);
  }

  get size(): number {
    return this.phasors.size;
  }

  /**
   * All phasors in creation order.
   */
  list(): readonly Phasor[] {
    return Array.from(this.phasors.values());
  }

  /**
   * Remove every phasor. The registry behaves as freshly constructed.
   */
  clear(): void {
    this.phasors.clear();
  }

  private resolve(name: string, spec: PhasorSpec): Phasor {
    if (name.length === 0) {
      throw new InvalidGeometryError(name, "name must not be empty");
    }
    if (this.phasors.has(name) && this.options.onDuplicate === "reject") {
      throw new DuplicatePhasorError(name);
    }

    const start = this.resolveStart(name, spec.anchor ?? { kind: "absolute" });
    const end = resolveEnd(name, start, spec.geometry);
    // Finite inputs can still overflow once combined
    if (!Vec2.isFinite(end)) {
      throw new InvalidGeometryError(name, "end point overflows the number range");
    }
    const magnitude = Vec2.distance(start, end);
    if (!Number.isFinite(magnitude)) {
      throw new InvalidGeometryError(name, "magnitude overflows the number range");
    }

    const kind = (spec.kind ?? DEFAULT_KIND).toLowerCase();
    if (spec.color !== undefined && !isKnownColor(spec.color)) {
      throw new InvalidPhasorInputError(
        `Phasor '${name}': unknown color '${spec.color}', use a named color or #rrggbb`
      );
    }
    validateDisplay(name, spec);

    return Object.freeze({
      name,
      kind,
      start,
      end,
      magnitude,
      angleDeg: Vec2.angleDeg(start, end),
      color: spec.color ?? defaultColorForKind(kind),
      label: spec.label ?? name,
      labelOffset: spec.labelOffset,
      arrowWidth: spec.arrowWidth,
    });
  }

  private resolveStart(name: string, anchor: Anchor): Vector2 {
    if (anchor.kind === "relative") {
      const ref = this.phasors.get(anchor.ref);
      if (!ref) {
        throw new UnknownReferenceError(name, anchor.ref);
      }
      // Referenced points are already frozen; share them as-is
      return anchor.point === "end" ? ref.end : ref.start;
    }

    const start = Object.freeze(Vec2.create(anchor.x ?? 0, anchor.y ?? 0));
    if (!Vec2.isFinite(start)) {
      throw new InvalidGeometryError(name, "start coordinates must be finite");
    }
    return start;
  }

  private insert(phasor: Phasor): void {
    // Overwrite moves the entry to the end so iteration stays in creation order
    this.phasors.delete(phasor.name);
    this.phasors.set(phasor.name, phasor);
  }
}

function resolveEnd(name: string, start: Vector2, geometry: GeometrySpec | undefined): Vector2 {
  if (geometry?.kind === "cartesian") {
    const end = Object.freeze(Vec2.create(geometry.endX, geometry.endY));
    if (!Vec2.isFinite(end)) {
      throw new InvalidGeometryError(name, "end coordinates must be finite");
    }
    return end;
  }

  if (geometry?.kind === "polar") {
    const { magnitude, angleDeg } = geometry;
    if (!Number.isFinite(magnitude) || magnitude < 0) {
      throw new InvalidGeometryError(name, `magnitude must be a finite number >= 0, got ${magnitude}`);
    }
    if (!Number.isFinite(angleDeg)) {
      throw new InvalidGeometryError(name, `angle must be finite, got ${angleDeg}`);
    }
    return Object.freeze(Vec2.add(start, Vec2.fromPolar(magnitude, angleDeg)));
  }

  throw new MissingGeometryError(name);
}

function validateDisplay(name: string, spec: PhasorSpec): void {
  if (spec.labelOffset !== undefined && !Number.isFinite(spec.labelOffset)) {
    throw new InvalidGeometryError(name, `label offset must be finite, got ${spec.labelOffset}`);
  }
  if (spec.arrowWidth !== undefined && !(Number.isFinite(spec.arrowWidth) && spec.arrowWidth > 0)) {
    throw new InvalidGeometryError(name, `arrow width must be a finite number > 0, got ${spec.arrowWidth}`);
  }
}
