/**
 * Errors raised while resolving or parsing phasors.
 *
 * All of them are synchronous and leave the registry untouched.
 */

export type PhasorErrorCode =
  | "UNKNOWN_REFERENCE"
  | "MISSING_GEOMETRY"
  | "DUPLICATE_NAME"
  | "INVALID_GEOMETRY"
  | "INVALID_INPUT";

/**
 * Base class for every phasor error.
 */
export class PhasorError extends Error {
  constructor(
    public readonly code: PhasorErrorCode,
    message: string
  ) {
    super(message);
    this.name = "PhasorError";
  }
}

/**
 * An anchor named a phasor that is not (yet) in the registry.
 */
export class UnknownReferenceError extends PhasorError {
  constructor(
    public readonly phasorName: string,
    public readonly ref: string
  ) {
    super("UNKNOWN_REFERENCE", `Phasor '${phasorName}' references '${ref}', which does not exist.`);
    this.name = "UnknownReferenceError";
  }
}

/**
 * Neither a complete end point nor a complete (magnitude, angle) pair.
 */
export class MissingGeometryError extends PhasorError {
  constructor(public readonly phasorName: string) {
    super(
      "MISSING_GEOMETRY",
      `Phasor '${phasorName}': either (endX, endY) or (magnitude, angle) must be provided.`
    );
    this.name = "MissingGeometryError";
  }
}

export class DuplicatePhasorError extends PhasorError {
  constructor(public readonly phasorName: string) {
    super("DUPLICATE_NAME", `Phasor '${phasorName}' already exists.`);
    this.name = "DuplicatePhasorError";
  }
}

/**
 * Geometry that is present but unusable: empty name, negative or
 * non-finite magnitude, non-finite coordinates.
 */
export class InvalidGeometryError extends PhasorError {
  constructor(
    public readonly phasorName: string,
    reason: string
  ) {
    super("INVALID_GEOMETRY", `Phasor '${phasorName}': ${reason}`);
    this.name = "InvalidGeometryError";
  }
}

/**
 * Loose input (JSON, keyword options, CLI triples) failed validation.
 */
export class InvalidPhasorInputError extends PhasorError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super("INVALID_INPUT", issues.length > 0 ? `${message}:\n${issues.join("\n")}` : message);
    this.name = "InvalidPhasorInputError";
  }
}
