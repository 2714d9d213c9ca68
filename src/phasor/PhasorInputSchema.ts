/**
 * Loose phasor input: keyword-style options and JSON diagram files.
 *
 * The typed PhasorSpec cannot express "no geometry"; this is the boundary
 * where untyped input is validated and turned into one.
 */

import { z } from "zod";
import type { Anchor, GeometrySpec, PhasorSpec } from "@/types";
import { isKnownColor } from "./colors";
import { InvalidPhasorInputError, MissingGeometryError } from "./errors";

/** startRef value meaning "use startX/startY" */
export const ABSOLUTE_REF = "abs";

export const RefPointSchema = z.union([z.literal("start"), z.literal("end")]);

export const PhasorOptionsSchema = z.object({
  name: z.string().min(1),
  magnitude: z.number().finite().nonnegative().optional(),
  angle: z.number().finite().optional(),
  startRef: z.string().min(1).default(ABSOLUTE_REF),
  startX: z.number().finite().default(0),
  startY: z.number().finite().default(0),
  endX: z.number().finite().optional(),
  endY: z.number().finite().optional(),
  refPoint: RefPointSchema.default("end"),
  phasorType: z.string().min(1).default("voltage"),
  color: z
    .string()
    .min(1)
    .refine(isKnownColor, (color) => ({ message: `Unknown color '${color}', use a named color or #rrggbb` }))
    .optional(),
  labelOffset: z.number().finite().optional(),
  arrowWidth: z.number().finite().positive().optional(),
});

export const DiagramFileSchema = z.object({
  title: z.string().optional(),
  phasors: z.array(PhasorOptionsSchema),
});

/** Options as a caller writes them (defaults not yet applied) */
export type PhasorOptionsInput = z.input<typeof PhasorOptionsSchema>;
export type PhasorOptions = z.output<typeof PhasorOptionsSchema>;
export type DiagramFile = z.output<typeof DiagramFileSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  ${path}: ${issue.message}`;
  });
}

/**
 * Validate keyword-style options.
 *
 * @throws InvalidPhasorInputError listing every schema violation
 */
export function parsePhasorOptions(input: unknown): PhasorOptions {
  const result = PhasorOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidPhasorInputError("Invalid phasor options", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate a parsed JSON diagram file.
 *
 * @throws InvalidPhasorInputError listing every schema violation
 */
export function parseDiagramFile(input: unknown): DiagramFile {
  const result = DiagramFileSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidPhasorInputError("Invalid diagram file", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Convert validated options into a typed spec.
 *
 * A complete (endX, endY) pair wins over (magnitude, angle).
 *
 * @throws MissingGeometryError when neither pair is complete
 */
export function toPhasorSpec(options: PhasorOptions): PhasorSpec {
  const anchor: Anchor =
    options.startRef === ABSOLUTE_REF
      ? { kind: "absolute", x: options.startX, y: options.startY }
      : { kind: "relative", ref: options.startRef, point: options.refPoint };

  return {
    geometry: toGeometry(options),
    anchor,
    kind: options.phasorType,
    color: options.color,
    labelOffset: options.labelOffset,
    arrowWidth: options.arrowWidth,
  };
}

function toGeometry(options: PhasorOptions): GeometrySpec {
  const { endX, endY, magnitude, angle } = options;
  if (endX !== undefined && endY !== undefined) {
    return { kind: "cartesian", endX, endY };
  }
  if (magnitude !== undefined && angle !== undefined) {
    return { kind: "polar", magnitude, angleDeg: angle };
  }
  throw new MissingGeometryError(options.name);
}
